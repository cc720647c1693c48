import type { PipelineConfig } from '../config/types.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { AggregateResult, CanonicalRecord, MovementMap, Snapshot } from '../core/record.js';
import { addDiagnostic, createExtractContext, type ExtractContext } from '../extract/extract-context.js';
import { extractRecords, type SourceInput } from '../extract/sources.js';
import { renderFailureNotice, renderReport } from '../render/report.js';
import { aggregate, applyExclusion, createExclusionFilter, toCanonicalRecord } from './aggregate.js';
import { compileProviderClassifier } from './classifier.js';
import { buildSnapshot, diffSnapshot } from './differ.js';

/** Counters printed in the run summary. */
export interface PipelineStats {
  blocksFound: number;
  rowsParsed: number;
  recordsDropped: number;
  recordsExcluded: number;
  models: number;
}

/** Successful run: report chunks and the snapshot to persist. */
export interface PipelineSuccess {
  status: 'ok';
  chunks: string[];
  snapshot: Snapshot;
  records: CanonicalRecord[];
  aggregate: AggregateResult;
  movements: MovementMap;
  diagnostics: Diagnostic[];
  stats: PipelineStats;
}

/** Run that produced no report; `notice` is sent in its place. */
export interface PipelineFailure {
  status: 'no-data' | 'all-filtered' | 'failed';
  notice: string;
  diagnostics: Diagnostic[];
  stats: PipelineStats;
}

/** Outcome of one pipeline invocation. */
export type PipelineOutcome = PipelineSuccess | PipelineFailure;

/**
 * Run extraction, classification, ranking, differencing and rendering for one
 * source. Data problems never throw: they end as diagnostics or as one of the
 * non-ok outcomes. `previous` is the prior run's snapshot, if any. Pass `ctx`
 * to continue a context that source loading already reported into.
 */
export function runPipeline(
  input: SourceInput,
  previous: Snapshot | undefined,
  config: PipelineConfig,
  ctx: ExtractContext = createExtractContext(config.mode, input.sourceName)
): PipelineOutcome {
  const stats: PipelineStats = { blocksFound: 0, rowsParsed: 0, recordsDropped: 0, recordsExcluded: 0, models: 0 };

  const extraction = extractRecords(input, config, ctx);
  stats.blocksFound = extraction.blocksFound;
  stats.rowsParsed = extraction.rowsParsed;
  stats.recordsDropped = extraction.dropped;

  if (extraction.records.length === 0) {
    addDiagnostic(ctx, 'NO_DATA', 'info', 'No entity records were extracted from the source.');
    return fail('no-data', ctx, stats, config);
  }

  if (ctx.mode === 'strict' && ctx.validationFailure) {
    return fail('failed', ctx, stats, config);
  }

  const { kept, excluded } = applyExclusion(extraction.records, createExclusionFilter(config));
  stats.recordsExcluded = excluded.length;
  if (kept.length === 0) {
    addDiagnostic(
      ctx,
      'ALL_FILTERED',
      'info',
      `The exclusion pattern removed all ${excluded.length} extracted record(s).`
    );
    return fail('all-filtered', ctx, stats, config);
  }

  const classifier = compileProviderClassifier(config);
  const records = kept.map((raw) => toCanonicalRecord(raw, config, classifier, ctx));
  stats.models = records.length;

  if (ctx.mode === 'strict' && ctx.validationFailure) {
    return fail('failed', ctx, stats, config);
  }

  const aggregated = aggregate(records, config);
  const groups = [...aggregated.leaderGroups, ...aggregated.providerGroups];
  const movements = diffSnapshot(groups, previous, config.topK);
  const chunks = renderReport({ aggregate: aggregated, movements, modelCount: records.length }, config);

  return {
    status: 'ok',
    chunks,
    snapshot: buildSnapshot(groups, config.topK),
    records,
    aggregate: aggregated,
    movements,
    diagnostics: ctx.diagnostics,
    stats
  };
}

/** Build a non-ok outcome with its notice. */
function fail(
  status: PipelineFailure['status'],
  ctx: ExtractContext,
  stats: PipelineStats,
  config: PipelineConfig
): PipelineFailure {
  const firstError = ctx.diagnostics.find((diagnostic) => diagnostic.severity === 'error');
  return {
    status,
    notice: renderFailureNotice(status, config.notices, firstError?.message),
    diagnostics: ctx.diagnostics,
    stats
  };
}
