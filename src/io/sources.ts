import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import type { PipelineConfig } from '../config/types.js';
import { SourceFetchError } from '../core/errors.js';
import { addDiagnostic, createExtractContext, type ExtractContext } from '../extract/extract-context.js';
import { htmlToLines } from '../extract/html-lines.js';
import type { JsonDocumentInput } from '../extract/json-documents.js';
import { splitSectionsByTitle, toLines } from '../extract/scraped-segments.js';
import type { JsonSource, MarkdownSource, ScrapedSource, SourceInput } from '../extract/sources.js';
import { runWithConcurrency } from './concurrency.js';
import { fetchJson, fetchText, type HttpOptions } from './http.js';

/** Source shapes accepted on the command line. */
export type SourceKind = SourceInput['kind'];

/** Repository holding one JSON document per model. */
export interface RepositoryRef {
  owner: string;
  repo: string;
  branch: string;
  /** Directory prefix of the model documents. */
  directory?: string;
  token?: string;
}

/** Options for repository tree fetches. */
export interface JsonTreeOptions extends HttpOptions {
  apiBaseUrl?: string;
  rawBaseUrl?: string;
  concurrency?: number;
}

const DEFAULT_API_BASE_URL = 'https://api.github.com';
const DEFAULT_RAW_BASE_URL = 'https://raw.githubusercontent.com';
const DEFAULT_DOCUMENT_DIRECTORY = 'models';
const DEFAULT_FETCH_CONCURRENCY = 8;

/** Download a markdown document. */
export async function fetchMarkdownSource(url: string, options: HttpOptions = {}): Promise<MarkdownSource> {
  return { kind: 'markdown', text: await fetchText(url, options), sourceName: url };
}

/**
 * Download a rendered page and split its visible text into one section per
 * category label.
 */
export async function fetchScrapedSource(
  url: string,
  config: PipelineConfig,
  options: HttpOptions = {}
): Promise<ScrapedSource> {
  const html = await fetchText(url, options);
  return { kind: 'scraped', sections: splitSectionsByTitle(htmlToLines(html), sectionTitles(config)), sourceName: url };
}

/** Download one JSON file holding a document or an array of documents. */
export async function fetchJsonDocumentsSource(url: string, options: HttpOptions = {}): Promise<JsonSource> {
  return { kind: 'json', documents: toJsonDocuments(url, await fetchJson(url, options)), sourceName: url };
}

/** One document per array item (ids suffixed `#index`), or the value itself. */
export function toJsonDocuments(id: string, value: unknown): JsonDocumentInput[] {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.map((document, index) => ({ id: `${id}#${index}`, document }));
  }
  return [{ id, document: value }];
}

/**
 * List `<directory>/**.json` blobs from a repository tree and fetch each raw
 * document. A failing tree listing throws; a failing document becomes a
 * `DOCUMENT_FETCH_FAILED` warning and is skipped.
 */
export async function fetchJsonTreeSource(
  ref: RepositoryRef,
  ctx: ExtractContext,
  options: JsonTreeOptions = {}
): Promise<JsonSource> {
  const apiBaseUrl = options.apiBaseUrl ?? DEFAULT_API_BASE_URL;
  const rawBaseUrl = options.rawBaseUrl ?? DEFAULT_RAW_BASE_URL;
  const directory = ref.directory ?? DEFAULT_DOCUMENT_DIRECTORY;
  const authHeaders: Record<string, string> = ref.token ? { Authorization: `Bearer ${ref.token}` } : {};

  const treeUrl = `${apiBaseUrl}/repos/${ref.owner}/${ref.repo}/git/trees/${ref.branch}?recursive=1`;
  const tree = await fetchJson(treeUrl, {
    ...options,
    headers: { Accept: 'application/vnd.github+json', ...authHeaders, ...options.headers }
  });
  const paths = listDocumentPaths(tree, directory);
  if (paths === undefined) {
    throw new SourceFetchError(treeUrl, `Tree listing from ${treeUrl} has no 'tree' array.`);
  }

  const fetched = await runWithConcurrency(paths, options.concurrency ?? DEFAULT_FETCH_CONCURRENCY, async (blobPath) => {
    const url = `${rawBaseUrl}/${ref.owner}/${ref.repo}/${ref.branch}/${blobPath}`;
    try {
      const document = await fetchJson(url, { ...options, headers: { ...authHeaders, ...options.headers } });
      return { id: blobPath, document };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      addDiagnostic(ctx, 'DOCUMENT_FETCH_FAILED', 'warning', message, { name: blobPath });
      return undefined;
    }
  });

  return {
    kind: 'json',
    documents: fetched.filter((item): item is JsonDocumentInput => item !== undefined),
    sourceName: `${ref.owner}/${ref.repo}@${ref.branch}`
  };
}

/** JSON blob paths under `directory` from a tree listing; undefined when the shape is wrong. */
export function listDocumentPaths(tree: unknown, directory: string): string[] | undefined {
  if (typeof tree !== 'object' || tree === null || !('tree' in tree) || !Array.isArray(tree.tree)) {
    return undefined;
  }

  const prefix = directory.length > 0 ? `${directory.replace(/\/+$/, '')}/` : '';
  const items: unknown[] = tree.tree;
  const paths: string[] = [];
  for (const item of items) {
    if (typeof item !== 'object' || item === null) {
      continue;
    }
    if (!('type' in item) || item.type !== 'blob' || !('path' in item) || typeof item.path !== 'string') {
      continue;
    }
    if (item.path.startsWith(prefix) && item.path.toLowerCase().endsWith('.json')) {
      paths.push(item.path);
    }
  }
  return paths.sort(compareCodeUnits);
}

/** Locale-independent ordering for document paths. */
export function compareCodeUnits(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Read a local source.
 *
 * - `markdown`: the file text.
 * - `json`: a directory of `*.json` documents (searched recursively), or one
 *   file holding a document or an array of documents.
 * - `scraped`: an `.html` page split by category labels, a YAML or JSON map of
 *   section label to text, or plain text split by category labels.
 */
export async function readFileSource(
  filePath: string,
  kind: SourceKind,
  config: PipelineConfig,
  ctx: ExtractContext = createExtractContext(config.mode, filePath)
): Promise<SourceInput> {
  switch (kind) {
    case 'markdown':
      return { kind: 'markdown', text: await readSourceText(filePath), sourceName: filePath };
    case 'json':
      return { kind: 'json', documents: await readJsonDocuments(filePath, ctx), sourceName: filePath };
    case 'scraped':
      return { kind: 'scraped', sections: await readScrapedSections(filePath, config), sourceName: filePath };
  }
}

/** Read a UTF-8 file, reporting failures as `SourceFetchError`. */
async function readSourceText(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceFetchError(filePath, `Cannot read ${filePath}: ${message}`);
  }
}

/** Load JSON documents from a file or a directory tree. */
async function readJsonDocuments(filePath: string, ctx: ExtractContext): Promise<JsonDocumentInput[]> {
  const info = await stat(filePath).catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceFetchError(filePath, `Cannot read ${filePath}: ${message}`);
  });

  if (!info.isDirectory()) {
    return toJsonDocuments(filePath, parseJsonText(filePath, await readSourceText(filePath)));
  }

  const documents: JsonDocumentInput[] = [];
  for (const documentPath of await findJsonFiles(filePath)) {
    try {
      documents.push({ id: documentPath, document: parseJsonText(documentPath, await readSourceText(documentPath)) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      addDiagnostic(ctx, 'DOCUMENT_UNREADABLE', 'warning', message, { name: documentPath });
    }
  }
  return documents;
}

/** Parse JSON text or throw `SourceFetchError`. */
function parseJsonText(filePath: string, text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceFetchError(filePath, `Invalid JSON in ${filePath}: ${message}`);
  }
}

/** Recursively discover `*.json` files, sorted by path. */
async function findJsonFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (entry.name.toLowerCase().endsWith('.json')) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches.sort(compareCodeUnits);
}

/** Load scraped sections from HTML, a label map, or plain text. */
async function readScrapedSections(filePath: string, config: PipelineConfig): Promise<Record<string, string>> {
  const text = await readSourceText(filePath);
  const extension = path.extname(filePath).toLowerCase();

  if (extension === '.html' || extension === '.htm') {
    return splitSectionsByTitle(htmlToLines(text), sectionTitles(config));
  }

  if (extension === '.json' || extension === '.yaml' || extension === '.yml') {
    let parsed: unknown;
    try {
      parsed = parseYaml(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceFetchError(filePath, `Invalid section map in ${filePath}: ${message}`);
    }
    return readSectionMap(filePath, parsed);
  }

  return splitSectionsByTitle(toLines(text), sectionTitles(config));
}

/** Validate a `label -> text` section map. */
function readSectionMap(filePath: string, input: unknown): Record<string, string> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new SourceFetchError(filePath, `Section map in ${filePath} must be an object of label to text.`);
  }

  const sections: Record<string, string> = {};
  for (const [label, value] of Object.entries(input)) {
    if (typeof value !== 'string') {
      throw new SourceFetchError(filePath, `Section '${label}' in ${filePath} must be text.`);
    }
    sections[label] = value;
  }
  return sections;
}

/** Heading lines that open a scraped section: category labels, localized labels included. */
export function sectionTitles(config: PipelineConfig): string[] {
  const titles = new Set<string>();
  for (const category of config.categories) {
    titles.add(category.label);
    const localized = config.report.categoryLabels[category.key];
    if (localized !== undefined) {
      titles.add(localized);
    }
  }
  return [...titles];
}
