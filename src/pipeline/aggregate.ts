import type { CategoryDefinition, PipelineConfig } from '../config/types.js';
import type {
  AggregateResult,
  CanonicalRecord,
  MetricReading,
  MetricValue,
  RankedEntry,
  RankedGroup,
  RawRecord
} from '../core/record.js';
import { addDiagnostic, type ExtractContext } from '../extract/extract-context.js';
import { isUnitScore } from '../extract/numeric.js';
import { classify, type ProviderClassifier } from './classifier.js';

/** Compiled name filter; `undefined` pattern keeps everything. */
export interface ExclusionFilter {
  pattern?: RegExp;
}

/** Records left after the exclusion filter, plus what it removed. */
export interface ExclusionResult<T extends { name: string }> {
  kept: T[];
  excluded: T[];
}

/** Flags an exclusion pattern keeps; `g` and `y` would make `test` stateful. */
const EXCLUSION_FLAGS = ['i', 'm', 's', 'u'];

/** Build the entity exclusion filter from configuration. */
export function createExclusionFilter(config: Pick<PipelineConfig, 'excludePattern'>): ExclusionFilter {
  if (!config.excludePattern) {
    return {};
  }
  const configured = config.excludePattern.flags;
  const flags = EXCLUSION_FLAGS.filter((flag) => flag === 'i' || configured.includes(flag)).join('');
  return { pattern: new RegExp(config.excludePattern.source, flags) };
}

/** Split records into kept and excluded by name, before any scoring. */
export function applyExclusion<T extends { name: string }>(records: readonly T[], filter: ExclusionFilter): ExclusionResult<T> {
  const kept: T[] = [];
  const excluded: T[] = [];
  for (const record of records) {
    if (filter.pattern?.test(record.name)) {
      excluded.push(record);
    } else {
      kept.push(record);
    }
  }
  return { kept, excluded };
}

/** True when a reading feeds `category` by key, table field or path keyword. */
export function readingMatchesCategory(key: string, category: CategoryDefinition): boolean {
  return (
    key === category.key ||
    category.fields.includes(key) ||
    category.keywords.some((keyword) => keyword.length > 0 && key.includes(keyword))
  );
}

/** Rank of a key by preferred metric suffix; unpreferred keys rank last. */
export function suffixRank(key: string, preferredSuffixes: readonly string[]): number {
  const index = preferredSuffixes.findIndex((suffix) => key.endsWith(suffix));
  return index === -1 ? preferredSuffixes.length : index;
}

/**
 * Derive one category score from raw readings. Only present, in-range values
 * count; out-of-range values are reported and ignored. The best candidate has
 * the lowest preferred-suffix rank and then the highest value, which for table
 * fields (no suffixes) is simply the maximum. No candidate means missing.
 */
export function deriveCategoryScore(
  readings: readonly MetricReading[],
  category: CategoryDefinition,
  preferredSuffixes: readonly string[],
  onOutOfRange?: (reading: MetricReading) => void
): MetricValue {
  let best: { rank: number; value: number } | undefined;

  for (const reading of readings) {
    if (reading.value === undefined || !readingMatchesCategory(reading.key, category)) {
      continue;
    }
    if (!isUnitScore(reading.value)) {
      onOutOfRange?.(reading);
      continue;
    }

    const rank = suffixRank(reading.key, preferredSuffixes);
    if (!best || rank < best.rank || (rank === best.rank && reading.value > best.value)) {
      best = { rank, value: reading.value };
    }
  }

  return best?.value;
}

/** Classify a raw record and derive every category metric. */
export function toCanonicalRecord(
  raw: RawRecord,
  config: PipelineConfig,
  classifier: ProviderClassifier,
  ctx: ExtractContext
): CanonicalRecord {
  const metrics: Record<string, MetricValue> = {};
  for (const category of config.categories) {
    metrics[category.key] = deriveCategoryScore(raw.readings, category, config.preferredMetricSuffixes, (reading) => {
      addDiagnostic(
        ctx,
        'OUT_OF_RANGE_SCORE',
        'warning',
        `Ignoring out-of-range value ${reading.value} for '${raw.name}'.`,
        { name: raw.origin.name, line: raw.origin.line },
        reading.key
      );
    });
  }

  const record: CanonicalRecord = {
    name: raw.name,
    provider: classify(raw.name, raw.categoryKey, classifier),
    metrics
  };
  if (raw.categoryKey !== undefined) {
    record.categoryKey = raw.categoryKey;
  }
  return record;
}

/** Mean of present metric values; 0 when none are present. */
export function compositeScore(metrics: Record<string, MetricValue>): number {
  const present = Object.values(metrics).filter((value): value is number => value !== undefined);
  if (present.length === 0) {
    return 0;
  }
  return present.reduce((sum, value) => sum + value, 0) / present.length;
}

/**
 * Group records by provider in encounter order of first appearance. Each group
 * is sorted by composite score, descending; `Array.prototype.sort` is stable so
 * ties keep encounter order and entities without metrics sink to the end.
 */
export function groupByProvider(records: readonly CanonicalRecord[]): RankedGroup[] {
  const groups = new Map<string, RankedEntry[]>();
  for (const record of records) {
    const entries = groups.get(record.provider) ?? [];
    if (!groups.has(record.provider)) {
      groups.set(record.provider, entries);
    }
    entries.push({
      name: record.name,
      provider: record.provider,
      score: compositeScore(record.metrics),
      metrics: record.metrics
    });
  }

  return [...groups.entries()].map(([provider, entries]): RankedGroup => ({
    id: `provider/${provider}`,
    kind: 'provider',
    key: provider,
    entries: [...entries].sort((left, right) => right.score - left.score)
  }));
}

/**
 * Top-K entities per category by derived score. Entities without a score in a
 * category are left out of that category; repeated names keep their first
 * (highest) entry.
 */
export function rankLeaders(
  records: readonly CanonicalRecord[],
  categories: readonly CategoryDefinition[],
  topK: number
): RankedGroup[] {
  return categories.map((category): RankedGroup => {
    const scored: RankedEntry[] = [];
    for (const record of records) {
      const value = record.metrics[category.key];
      if (value === undefined) {
        continue;
      }
      scored.push({ name: record.name, provider: record.provider, score: value, metrics: record.metrics });
    }

    scored.sort((left, right) => right.score - left.score);

    const seen = new Set<string>();
    const unique: RankedEntry[] = [];
    for (const entry of scored) {
      if (!seen.has(entry.name)) {
        seen.add(entry.name);
        unique.push(entry);
      }
    }

    return {
      id: `leaders/${category.key}`,
      kind: 'leaders',
      key: category.key,
      entries: unique.slice(0, topK)
    };
  });
}

/** Build leader and provider groups from filtered canonical records. */
export function aggregate(records: readonly CanonicalRecord[], config: PipelineConfig): AggregateResult {
  return {
    leaderGroups: rankLeaders(records, config.categories, config.topK),
    providerGroups: groupByProvider(records)
  };
}
