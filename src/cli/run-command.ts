import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Command, Option } from 'commander';
import type { Dispatcher } from 'undici';

import { loadPipelineConfig, parseExclusionPattern } from '../config/config-loader.js';
import type { PipelineConfig, PipelineConfigOverrides } from '../config/types.js';
import { buildSeverityHistogram, formatDiagnostic } from '../core/diagnostics.js';
import { ConfigError } from '../core/errors.js';
import { createExtractContext, type ExtractContext } from '../extract/extract-context.js';
import type { SourceInput } from '../extract/sources.js';
import type { HttpOptions } from '../io/http.js';
import { FileSnapshotStore } from '../io/snapshot-store.js';
import { ConsoleSink, deliverAll, TelegramSink, type ReportSink, type TextWriter } from '../io/sinks.js';
import {
  fetchJsonDocumentsSource,
  fetchJsonTreeSource,
  fetchMarkdownSource,
  fetchScrapedSource,
  readFileSource,
  type RepositoryRef,
  type SourceKind
} from '../io/sources.js';
import { runPipeline, type PipelineOutcome } from '../pipeline/run-pipeline.js';
import { renderFailureNotice } from '../render/report.js';

/** Source kinds accepted by `--source`. */
export const SOURCE_KINDS: readonly SourceKind[] = ['markdown', 'json', 'scraped'];

/** Inputs used when `--input` is omitted. */
export const DEFAULT_INPUTS: Readonly<Record<SourceKind, string>> = {
  markdown: 'https://raw.githubusercontent.com/JonathanChavezTamales/llm-leaderboard/main/README.md',
  json: 'github:JonathanChavezTamales/llm-leaderboard@main',
  scraped: 'https://llm-stats.com/'
};

const REPOSITORY_PREFIX = 'github:';
const USER_AGENT = 'leaderboard-digest/0.1';
const DEBUG_HEAD_LENGTH = 5000;

/** Exit codes of the `run` command. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Parsed `run` options. */
export type RunOptions = {
  source: SourceKind;
  input?: string;
  config?: string;
  snapshot: string;
  dryRun?: boolean;
  strict?: boolean;
  exclude?: string;
  debugDir?: string;
};

/** Process surroundings of a run, injectable for tests. */
export interface CliDependencies {
  env: Record<string, string | undefined>;
  stdout: TextWriter;
  stderr: TextWriter;
  /** Replaces the Telegram or console sink. */
  sink?: ReportSink;
  dispatcher?: Dispatcher;
}

/** Build the `leaderboard-digest` program. The `run` action sets `process.exitCode`. */
export function createProgram(deps: CliDependencies): Command {
  const program = new Command();
  program
    .name('leaderboard-digest')
    .description('Summarize model leaderboards into chunked daily reports with day-over-day movement');

  program
    .command('run')
    .description('Extract, rank, diff and deliver one report')
    .addOption(new Option('--source <kind>', 'source shape').choices(SOURCE_KINDS).default('markdown'))
    .option('--input <pathOrUrl>', 'local file or directory, http(s) URL, or github:owner/repo@branch for json')
    .option('--config <path>', 'YAML configuration layered over the defaults')
    .option('--snapshot <path>', 'snapshot file for day-over-day movement', '.leaderboard-digest/snapshot.json')
    .option('--exclude <regex>', 'exclusion pattern; overrides EXCLUDE_REGEX, empty disables')
    .option('--debug-dir <dir>', 'write the head of an unparseable source here')
    .option('--dry-run', 'print chunks instead of sending them and keep the snapshot unchanged')
    .option('--strict', 'treat warnings as failures')
    .action(async (_options: unknown, command: Command) => {
      process.exitCode = await runCommand(command.opts<RunOptions>(), deps);
    });

  return program;
}

/** Execute one run and return its exit code. Every failure is reported, none is thrown. */
export async function runCommand(options: RunOptions, deps: CliDependencies): Promise<number> {
  const log = (line: string): void => {
    deps.stderr.write(`${line}\n`);
  };

  let config: PipelineConfig;
  try {
    config = await loadPipelineConfig(options.config, buildOverrides(options, deps.env));
  } catch (error) {
    log(`[error] ${describeError(error)}`);
    return EXIT_FAILURE;
  }

  const sink = deps.sink ?? createSink(options, deps);
  if (!sink) {
    log('[error] TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required unless --dry-run is given.');
    return EXIT_USAGE;
  }

  const input = options.input ?? DEFAULT_INPUTS[options.source];
  try {
    const ctx = createExtractContext(config.mode, input);
    const source = await loadSource(options.source, input, config, ctx, deps);
    const store = new FileSnapshotStore(options.snapshot);
    const previous = await store.load();
    const outcome = runPipeline(source, previous, config, ctx);

    printSummary(outcome, log);

    if (outcome.status !== 'ok') {
      if (outcome.status === 'no-data' && options.debugDir) {
        await writeDebugHead(options.debugDir, source, log);
      }
      await notifyFailure(sink, outcome.notice, log);
      return EXIT_FAILURE;
    }

    const sent = await deliverAll(outcome.chunks, sink);
    if (!options.dryRun) {
      await store.save(outcome.snapshot);
    }
    log(`[ok] Sent ${sent} message(s). Providers: ${outcome.aggregate.providerGroups.map((group) => group.key).join(', ')}`);
    return EXIT_OK;
  } catch (error) {
    const message = describeError(error);
    log(`[error] ${message}`);
    await notifyFailure(sink, renderFailureNotice('error', config.notices, message), log);
    return EXIT_FAILURE;
  }
}

/** Inline configuration from flags and environment; keys are only set when given. */
export function buildOverrides(options: RunOptions, env: Record<string, string | undefined>): PipelineConfigOverrides {
  const overrides: PipelineConfigOverrides = {};
  if (options.strict) {
    overrides.mode = 'strict';
  }

  if (options.exclude !== undefined) {
    overrides.excludePattern = parseExclusionPattern(options.exclude, '--exclude');
  } else if (env.EXCLUDE_REGEX !== undefined) {
    overrides.excludePattern = parseExclusionPattern(env.EXCLUDE_REGEX, 'EXCLUDE_REGEX');
  }

  return overrides;
}

/** Console sink for dry runs, Telegram otherwise; undefined when credentials are missing. */
function createSink(options: RunOptions, deps: CliDependencies): ReportSink | undefined {
  if (options.dryRun) {
    return new ConsoleSink(deps.stdout);
  }

  const token = deps.env.TELEGRAM_BOT_TOKEN;
  const chatId = deps.env.TELEGRAM_CHAT_ID;
  if (!token || !chatId) {
    return undefined;
  }
  return new TelegramSink({ token, chatId, dispatcher: deps.dispatcher });
}

/** Resolve `input` to a source: repository reference, URL, or local path. */
async function loadSource(
  kind: SourceKind,
  input: string,
  config: PipelineConfig,
  ctx: ExtractContext,
  deps: CliDependencies
): Promise<SourceInput> {
  const http: HttpOptions = { dispatcher: deps.dispatcher, headers: { 'User-Agent': USER_AGENT } };

  if (input.startsWith(REPOSITORY_PREFIX)) {
    if (kind !== 'json') {
      throw new ConfigError('--input', `${REPOSITORY_PREFIX} inputs are only valid with --source json`);
    }
    const ref = parseRepositoryRef(input.slice(REPOSITORY_PREFIX.length));
    const token = deps.env.GITHUB_TOKEN ?? deps.env.GH_TOKEN;
    return fetchJsonTreeSource(token ? { ...ref, token } : ref, ctx, http);
  }

  if (/^https?:\/\//i.test(input)) {
    switch (kind) {
      case 'markdown':
        return fetchMarkdownSource(input, http);
      case 'json':
        return fetchJsonDocumentsSource(input, http);
      case 'scraped':
        return fetchScrapedSource(input, config, http);
    }
  }

  return readFileSource(input, kind, config, ctx);
}

/** Parse `owner/repo[@branch][:directory]`; the branch defaults to `main`. */
export function parseRepositoryRef(value: string): RepositoryRef {
  const match = /^([\w.-]+)\/([\w.-]+)(?:@([\w./-]+?))?(?::([\w./-]*))?$/.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new ConfigError('--input', `expected owner/repo[@branch][:directory], got '${value}'`);
  }

  const ref: RepositoryRef = { owner: match[1], repo: match[2], branch: match[3] ?? 'main' };
  if (match[4] !== undefined) {
    ref.directory = match[4];
  }
  return ref;
}

/** Print run counters and every warning or error diagnostic. */
function printSummary(outcome: PipelineOutcome, log: (line: string) => void): void {
  const { stats } = outcome;
  log(
    `[info] blocks found: ${stats.blocksFound}, rows parsed: ${stats.rowsParsed}, dropped: ${stats.recordsDropped}, ` +
      `excluded: ${stats.recordsExcluded}, models: ${stats.models}`
  );

  const severities = buildSeverityHistogram(outcome.diagnostics);
  if ((severities.warning ?? 0) + (severities.error ?? 0) > 0) {
    log(`[info] diagnostics: ${severities.error ?? 0} error(s), ${severities.warning ?? 0} warning(s)`);
  }
  for (const diagnostic of outcome.diagnostics) {
    if (diagnostic.severity !== 'info') {
      log(formatDiagnostic(diagnostic));
    }
  }
  if (outcome.status === 'ok') {
    log(`[info] chunks: ${outcome.chunks.length}`);
  } else {
    log(`[info] outcome: ${outcome.status}`);
  }
}

/** Send a failure notice; a delivery failure is logged, not rethrown. */
async function notifyFailure(sink: ReportSink, notice: string, log: (line: string) => void): Promise<void> {
  try {
    await sink.deliver(notice);
  } catch (error) {
    log(`[warn] failure notice not delivered: ${describeError(error)}`);
  }
}

/** Keep the head of a textual source for inspection after a no-data run. */
async function writeDebugHead(debugDir: string, source: SourceInput, log: (line: string) => void): Promise<void> {
  let text: string;
  switch (source.kind) {
    case 'markdown':
      text = source.text;
      break;
    case 'json':
      text = JSON.stringify(source.documents, null, 2);
      break;
    case 'scraped':
      text = JSON.stringify(source.sections, null, 2);
      break;
  }
  const filePath = path.join(debugDir, 'source_head.txt');
  await mkdir(debugDir, { recursive: true });
  await writeFile(filePath, text.slice(0, DEBUG_HEAD_LENGTH), 'utf8');
  log(`[info] wrote ${filePath}`);
}

/** Message text of an unknown thrown value. */
function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
