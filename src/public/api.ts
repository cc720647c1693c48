import { loadPipelineConfig } from '../config/config-loader.js';
import type { PipelineConfig, PipelineConfigOverrides } from '../config/types.js';
import type { SourceInput } from '../extract/sources.js';
import type { SnapshotStore } from '../io/snapshot-store.js';
import { deliverAll, type ReportSink } from '../io/sinks.js';
import { runPipeline, type PipelineOutcome } from '../pipeline/run-pipeline.js';

export type { PipelineConfig, PipelineConfigOverrides } from '../config/types.js';
export { ConfigError, DeliveryError, SourceFetchError } from '../core/errors.js';
export type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
export type {
  AggregateResult,
  CanonicalRecord,
  MetricValue,
  Movement,
  RankedEntry,
  RankedGroup,
  RawRecord,
  Snapshot
} from '../core/record.js';
export type { JsonSource, MarkdownSource, ScrapedSource, SourceInput } from '../extract/sources.js';
export { loadDefaultConfig, loadPipelineConfig } from '../config/config-loader.js';
export { FileSnapshotStore, MemorySnapshotStore, type SnapshotStore } from '../io/snapshot-store.js';
export { ConsoleSink, MemorySink, TelegramSink, deliverAll, type ReportSink } from '../io/sinks.js';
export {
  fetchJsonDocumentsSource,
  fetchJsonTreeSource,
  fetchMarkdownSource,
  fetchScrapedSource,
  readFileSource
} from '../io/sources.js';
export { runPipeline, type PipelineOutcome, type PipelineStats } from '../pipeline/run-pipeline.js';
export { readSectionOrder, renderFailureNotice } from '../render/report.js';

/** Options for a full digest run through the public API. */
export interface DigestOptions {
  /** Resolved configuration; loaded from `configPath` and `overrides` when absent. */
  config?: PipelineConfig;
  configPath?: string;
  overrides?: PipelineConfigOverrides;
  /** Prior snapshot source; the next snapshot is saved here after an ok run. */
  store?: SnapshotStore;
  /** Receives the report chunks, or the notice of a non-ok run. */
  sink?: ReportSink;
}

/** Digest outcome plus the number of messages handed to the sink. */
export interface DigestResult {
  outcome: PipelineOutcome;
  delivered: number;
}

/**
 * Run one digest end to end: resolve configuration, load the prior snapshot,
 * run the pipeline, deliver, then save the next snapshot. Delivery failures
 * reject with `DeliveryError` and leave the stored snapshot untouched.
 */
export async function generateDigest(input: SourceInput, options: DigestOptions = {}): Promise<DigestResult> {
  const config = options.config ?? (await loadPipelineConfig(options.configPath, options.overrides));
  const previous = options.store ? await options.store.load() : undefined;
  const outcome = runPipeline(input, previous, config);

  let delivered = 0;
  if (options.sink) {
    delivered = await deliverAll(outcome.status === 'ok' ? outcome.chunks : [outcome.notice], options.sink);
  }

  if (outcome.status === 'ok' && options.store) {
    await options.store.save(outcome.snapshot);
  }

  return { outcome, delivered };
}
