import { access, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../core/errors.js';
import type {
  AliasTable,
  CategoryDefinition,
  ExclusionPattern,
  NoticeOptions,
  PipelineConfig,
  PipelineConfigOverrides,
  ProviderDefinition,
  ReportOptions,
  ScrapedOptions
} from './types.js';

/**
 * Default document locations relative to this module, probed in order so the
 * loader works from both the TypeScript sources and the `dist/` build.
 */
const DEFAULT_CONFIG_CANDIDATES = ['../../config/default.yaml', '../../../config/default.yaml'];

/** Label used in errors for layers that do not come from a file. */
const INLINE_SOURCE = '<inline>';

/** Resolve the bundled `config/default.yaml` path. */
export async function resolveDefaultConfigPath(): Promise<string> {
  for (const candidate of DEFAULT_CONFIG_CANDIDATES) {
    const filePath = fileURLToPath(new URL(candidate, import.meta.url));
    if (await exists(filePath)) {
      return filePath;
    }
  }

  throw new ConfigError('config/default.yaml', 'bundled default configuration not found');
}

/** Load the bundled defaults only. */
export async function loadDefaultConfig(): Promise<PipelineConfig> {
  return loadPipelineConfig();
}

/**
 * Load defaults, then an optional override document, then inline overrides.
 * Nested `scraped`, `report` and `notices` blocks merge key by key; every other
 * key replaces the value beneath it.
 */
export async function loadPipelineConfig(
  overridePath?: string,
  overrides: PipelineConfigOverrides = {}
): Promise<PipelineConfig> {
  const defaultPath = await resolveDefaultConfigPath();
  let merged = await readConfigLayer(defaultPath);

  if (overridePath) {
    merged = mergeConfigOverrides(merged, await readConfigLayer(overridePath));
  }

  merged = mergeConfigOverrides(merged, overrides);
  return resolvePipelineConfig(overridePath ?? defaultPath, merged);
}

/** Read and validate one YAML configuration layer. */
export async function readConfigLayer(filePath: string): Promise<PipelineConfigOverrides> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'unable to read file');
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'invalid YAML');
  }

  return parseConfigDocument(filePath, parsed ?? {});
}

/** Validate an untrusted configuration object into a partial layer. */
export function parseConfigDocument(filePath: string, input: unknown): PipelineConfigOverrides {
  if (!isRecord(input)) {
    throw new ConfigError(filePath, 'configuration must be a YAML object');
  }

  const layer: PipelineConfigOverrides = {};

  const mode = input.mode;
  if (mode !== undefined && mode !== null) {
    if (mode !== 'strict' && mode !== 'lenient') {
      throw new ConfigError(filePath, "'mode' must be 'strict' or 'lenient'");
    }
    layer.mode = mode;
  }

  if ('excludePattern' in input) {
    layer.excludePattern = readExclusionPattern(filePath, input.excludePattern);
  }

  const columnAliases = readOptionalAliasTable(filePath, input, 'columnAliases');
  if (columnAliases !== undefined) {
    layer.columnAliases = columnAliases;
  }

  const categories = readOptionalCategories(filePath, input, 'categories');
  if (categories !== undefined) {
    layer.categories = categories;
  }

  const suffixes = readOptionalStringArray(filePath, input, 'preferredMetricSuffixes');
  if (suffixes !== undefined) {
    layer.preferredMetricSuffixes = suffixes.map((suffix) => suffix.toLowerCase());
  }

  const containers = readOptionalStringArray(filePath, input, 'jsonContainers');
  if (containers !== undefined) {
    layer.jsonContainers = containers;
  }

  const providers = readOptionalProviders(filePath, input, 'providers');
  if (providers !== undefined) {
    layer.providers = providers;
  }

  const fallbackProvider = readOptionalString(filePath, input, 'fallbackProvider');
  if (fallbackProvider !== undefined) {
    layer.fallbackProvider = fallbackProvider;
  }

  const scraped = readOptionalScraped(filePath, input, 'scraped');
  if (scraped !== undefined) {
    layer.scraped = scraped;
  }

  const topK = readOptionalPositiveInteger(filePath, input, 'topK');
  if (topK !== undefined) {
    layer.topK = topK;
  }

  const chunkBudgetBytes = readOptionalPositiveInteger(filePath, input, 'chunkBudgetBytes');
  if (chunkBudgetBytes !== undefined) {
    layer.chunkBudgetBytes = chunkBudgetBytes;
  }

  const report = readOptionalReport(filePath, input, 'report');
  if (report !== undefined) {
    layer.report = report;
  }

  const notices = readOptionalNotices(filePath, input, 'notices');
  if (notices !== undefined) {
    layer.notices = notices;
  }

  return layer;
}

/** Merge `layer` over `base`. */
export function mergeConfigOverrides(
  base: PipelineConfigOverrides,
  layer: PipelineConfigOverrides
): PipelineConfigOverrides {
  const merged: PipelineConfigOverrides = { ...base, ...layer };

  if (base.scraped || layer.scraped) {
    merged.scraped = { ...base.scraped, ...layer.scraped };
  }
  if (base.notices || layer.notices) {
    merged.notices = { ...base.notices, ...layer.notices };
  }
  if (base.report || layer.report) {
    merged.report = {
      ...base.report,
      ...layer.report,
      categoryLabels: { ...base.report?.categoryLabels, ...layer.report?.categoryLabels },
      providerLabels: { ...base.report?.providerLabels, ...layer.report?.providerLabels }
    };
  }

  return merged;
}

/** Require every field of a merged layer stack. */
export function resolvePipelineConfig(filePath: string, merged: PipelineConfigOverrides): PipelineConfig {
  const scraped = merged.scraped ?? {};
  const report = merged.report ?? {};
  const notices = merged.notices ?? {};

  const config: PipelineConfig = {
    mode: merged.mode ?? 'lenient',
    excludePattern: merged.excludePattern ?? null,
    columnAliases: required(filePath, 'columnAliases', merged.columnAliases),
    categories: required(filePath, 'categories', merged.categories),
    preferredMetricSuffixes: merged.preferredMetricSuffixes ?? [],
    jsonContainers: merged.jsonContainers ?? [],
    providers: merged.providers ?? [],
    fallbackProvider: merged.fallbackProvider ?? 'Other',
    scraped: {
      rankMarkers: required(filePath, 'scraped.rankMarkers', scraped.rankMarkers),
      scanLines: required(filePath, 'scraped.scanLines', scraped.scanLines),
      scoreRange: required(filePath, 'scraped.scoreRange', scraped.scoreRange)
    },
    topK: required(filePath, 'topK', merged.topK),
    chunkBudgetBytes: required(filePath, 'chunkBudgetBytes', merged.chunkBudgetBytes),
    report: {
      title: required(filePath, 'report.title', report.title),
      attribution: required(filePath, 'report.attribution', report.attribution),
      modelsScannedLabel: required(filePath, 'report.modelsScannedLabel', report.modelsScannedLabel),
      noDataLabel: required(filePath, 'report.noDataLabel', report.noDataLabel),
      showLeaderSections: report.showLeaderSections ?? true,
      showProviderSections: report.showProviderSections ?? true,
      categoryLabels: report.categoryLabels ?? {},
      providerLabels: report.providerLabels ?? {}
    },
    notices: {
      noData: required(filePath, 'notices.noData', notices.noData),
      allFiltered: required(filePath, 'notices.allFiltered', notices.allFiltered),
      failed: required(filePath, 'notices.failed', notices.failed),
      error: required(filePath, 'notices.error', notices.error)
    }
  };

  if (!config.columnAliases.some((entry) => entry.field === 'name')) {
    throw new ConfigError(filePath, "'columnAliases' must define the 'name' field");
  }

  const categoryKeys = new Set<string>();
  for (const category of config.categories) {
    if (categoryKeys.has(category.key)) {
      throw new ConfigError(filePath, `duplicate category key '${category.key}'`);
    }
    categoryKeys.add(category.key);
  }

  return config;
}

/**
 * Parse an exclusion pattern from a plain string. A leading inline `(?i)` flag
 * group is accepted and dropped; matching is always case-insensitive.
 */
export function parseExclusionPattern(raw: string, filePath = INLINE_SOURCE): ExclusionPattern | null {
  const source = raw.trim().replace(/^\(\?i\)/, '');
  if (source.length === 0) {
    return null;
  }

  try {
    new RegExp(source, 'i');
  } catch (error) {
    throw new ConfigError(filePath, `invalid exclusion pattern: ${error instanceof Error ? error.message : source}`);
  }

  return { source, flags: 'i' };
}

/** Read `excludePattern` as null, a string, or `{ source, flags }`. */
function readExclusionPattern(filePath: string, value: unknown): ExclusionPattern | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'string') {
    return parseExclusionPattern(value, filePath);
  }

  if (isRecord(value)) {
    const source = readRequiredString(filePath, value, 'source');
    const flags = readOptionalString(filePath, value, 'flags') ?? '';
    const pattern = parseExclusionPattern(source, filePath);
    if (pattern && !/^[imsu]*$/.test(flags)) {
      throw new ConfigError(filePath, "'excludePattern.flags' may only contain i, m, s or u");
    }
    return pattern ? { source: pattern.source, flags: flags.includes('i') ? flags : `${flags}i` } : null;
  }

  throw new ConfigError(filePath, "'excludePattern' must be a string, an object or null");
}

/** Read the ordered column alias table. */
function readOptionalAliasTable(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): AliasTable | undefined {
  const items = readOptionalObjectArray(filePath, obj, key);
  if (items === undefined) {
    return undefined;
  }

  return items.map((item) => ({
    field: readRequiredString(filePath, item, 'field'),
    aliases: readRequiredStringArray(filePath, item, 'aliases')
  }));
}

/** Read ordered metric category definitions. */
function readOptionalCategories(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): CategoryDefinition[] | undefined {
  const items = readOptionalObjectArray(filePath, obj, key);
  if (items === undefined) {
    return undefined;
  }

  return items.map((item) => ({
    key: readRequiredString(filePath, item, 'key'),
    label: readRequiredString(filePath, item, 'label'),
    fields: readOptionalStringArray(filePath, item, 'fields') ?? [],
    keywords: (readOptionalStringArray(filePath, item, 'keywords') ?? []).map((keyword) => keyword.toLowerCase())
  }));
}

/** Read the ordered provider precedence list. */
function readOptionalProviders(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): ProviderDefinition[] | undefined {
  const items = readOptionalObjectArray(filePath, obj, key);
  if (items === undefined) {
    return undefined;
  }

  return items.map((item) => ({
    label: readRequiredString(filePath, item, 'label'),
    keywords: readRequiredStringArray(filePath, item, 'keywords')
  }));
}

/** Read the nested `scraped` block. */
function readOptionalScraped(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Partial<ScrapedOptions> | undefined {
  const value = readOptionalObject(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const result: Partial<ScrapedOptions> = {};
  const rankMarkers = readOptionalPositiveInteger(filePath, value, 'rankMarkers');
  if (rankMarkers !== undefined) {
    result.rankMarkers = rankMarkers;
  }
  const scanLines = readOptionalPositiveInteger(filePath, value, 'scanLines');
  if (scanLines !== undefined) {
    result.scanLines = scanLines;
  }

  const range = value.scoreRange;
  if (range !== undefined && range !== null) {
    if (!Array.isArray(range) || range.length !== 2) {
      throw new ConfigError(filePath, "'scraped.scoreRange' must be a [min, max] pair");
    }
    const [min, max] = range;
    if (typeof min !== 'number' || typeof max !== 'number' || !Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new ConfigError(filePath, "'scraped.scoreRange' must hold two finite numbers with min <= max");
    }
    result.scoreRange = [min, max];
  }

  return result;
}

/** Read the nested `report` block. */
function readOptionalReport(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Partial<ReportOptions> | undefined {
  const value = readOptionalObject(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const result: Partial<ReportOptions> = {};
  for (const field of ['title', 'attribution', 'modelsScannedLabel', 'noDataLabel'] as const) {
    const text = readOptionalString(filePath, value, field);
    if (text !== undefined) {
      result[field] = text;
    }
  }
  for (const field of ['showLeaderSections', 'showProviderSections'] as const) {
    const flag = readOptionalBoolean(filePath, value, field);
    if (flag !== undefined) {
      result[field] = flag;
    }
  }

  const categoryLabels = readOptionalStringMap(filePath, value, 'categoryLabels');
  if (categoryLabels !== undefined) {
    result.categoryLabels = categoryLabels;
  }
  const providerLabels = readOptionalStringMap(filePath, value, 'providerLabels');
  if (providerLabels !== undefined) {
    result.providerLabels = providerLabels;
  }

  return result;
}

/** Read the nested `notices` block. */
function readOptionalNotices(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Partial<NoticeOptions> | undefined {
  const value = readOptionalObject(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const result: Partial<NoticeOptions> = {};
  for (const field of ['noData', 'allFiltered', 'failed', 'error'] as const) {
    const text = readOptionalString(filePath, value, field);
    if (text !== undefined) {
      result[field] = text;
    }
  }
  return result;
}

/** Return a value that every complete configuration needs. */
function required<T>(filePath: string, key: string, value: T | undefined): T {
  if (value === undefined) {
    throw new ConfigError(filePath, `missing '${key}'`);
  }
  return value;
}

/** Narrow unknown YAML values to plain objects. */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a required non-empty string field. */
function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string field. */
function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConfigError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Read an optional boolean field. */
function readOptionalBoolean(filePath: string, obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(filePath, `'${key}' must be a boolean`);
  }

  return value;
}

/** Read an optional positive integer field. */
function readOptionalPositiveInteger(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(filePath, `'${key}' must be a positive integer`);
  }

  return value;
}

/** Read a required string-array field. */
function readRequiredStringArray(filePath: string, obj: Record<string, unknown>, key: string): string[] {
  const value = readOptionalStringArray(filePath, obj, key);
  if (value === undefined) {
    throw new ConfigError(filePath, `missing '${key}'`);
  }
  return value;
}

/** Read an optional string-array field. */
function readOptionalStringArray(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(filePath, `'${key}' must be an array of strings`);
  }

  return value;
}

/** Read an optional string -> string map. */
function readOptionalStringMap(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, string> | undefined {
  const value = readOptionalObject(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const result: Record<string, string> = {};
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new ConfigError(filePath, `'${key}.${entryKey}' must be a string`);
    }
    result[entryKey] = entryValue;
  }
  return result;
}

/** Read an optional nested object field. */
function readOptionalObject(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isRecord(value)) {
    throw new ConfigError(filePath, `'${key}' must be an object`);
  }

  return value;
}

/** Read an optional array of objects. */
function readOptionalObjectArray(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown>[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new ConfigError(filePath, `'${key}' must be an array of objects`);
  }

  return value;
}

/** Promise-based existence check used by default config resolution. */
async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
