/**
 * Normalized unit-scale score. `undefined` is the "missing" value and flows
 * through every stage instead of a NaN sentinel.
 */
export type MetricValue = number | undefined;

/** Which source shape produced a raw record. */
export type RecordSourceKind = 'table' | 'json' | 'scraped';

/** Where a raw record came from, for diagnostics. */
export interface RecordOrigin {
  kind: RecordSourceKind;
  name?: string;
  line?: number;
}

/** One raw metric observation keyed by field, JSON path or category key. */
export interface MetricReading {
  key: string;
  value: MetricValue;
}

/** Adapter output: one entity before classification and metric derivation. */
export interface RawRecord {
  name: string;
  categoryKey?: string;
  origin: RecordOrigin;
  readings: MetricReading[];
}

/** One evaluated entity in canonical shape. */
export interface CanonicalRecord {
  name: string;
  categoryKey?: string;
  provider: string;
  /** Category key to derived score; every present value lies in `[0, 1]`. */
  metrics: Record<string, MetricValue>;
}

/** Ranked row in a provider or leader group. */
export interface RankedEntry {
  name: string;
  provider: string;
  /** Score that ordered this group: composite for providers, category score for leaders. */
  score: number;
  metrics: Record<string, MetricValue>;
}

/** Kind of ranked group rendered as one report section. */
export type RankedGroupKind = 'leaders' | 'provider';

/** Ordered ranked entities rendered as one report section. */
export interface RankedGroup {
  /** Stable identifier, also the snapshot key (`leaders/coding`, `provider/OpenAI`). */
  id: string;
  kind: RankedGroupKind;
  /** Category key (leaders) or provider label (provider). */
  key: string;
  entries: RankedEntry[];
}

/** Aggregator output. */
export interface AggregateResult {
  leaderGroups: RankedGroup[];
  providerGroups: RankedGroup[];
}

/** One persisted `(name, score)` pair; score is in percent points, one decimal. */
export interface SnapshotEntry {
  name: string;
  score: number;
}

/** Prior run's top-K per group, keyed by group id. */
export type Snapshot = Record<string, SnapshotEntry[]>;

/** Day-over-day rank movement for one entity. */
export type Movement =
  | { kind: 'up'; places: number; delta?: number }
  | { kind: 'down'; places: number; delta?: number }
  | { kind: 'unchanged'; delta?: number }
  | { kind: 'new' };

/** Movements keyed by group id, aligned with the group's entry positions. */
export type MovementMap = Record<string, Movement[]>;
