import type { ExtractMode } from '../extract/extract-context.js';

/** Identity fields of the column alias table; every other field is a raw metric. */
export const IDENTITY_FIELDS = ['name', 'provider'] as const;

/** One canonical field with its ordered accepted header labels. */
export interface AliasTableEntry {
  field: string;
  aliases: string[];
}

/** Ordered canonical field -> alias mapping. */
export type AliasTable = AliasTableEntry[];

/** Metric category shown in reports and used for leader ranking. */
export interface CategoryDefinition {
  key: string;
  label: string;
  /** Raw table fields feeding this category. */
  fields: string[];
  /** Substrings matched against flattened JSON key paths. */
  keywords: string[];
}

/** Provider label with the name tokens that identify it. */
export interface ProviderDefinition {
  label: string;
  keywords: string[];
}

/** Regular expression source applied case-insensitively to entity names. */
export interface ExclusionPattern {
  source: string;
  flags: string;
}

/** Anchored-segment extraction tuning. */
export interface ScrapedOptions {
  /** Highest rank marker searched for in one section. */
  rankMarkers: number;
  /** Number of segment lines scanned for a score. */
  scanLines: number;
  /** Inclusive plausible score range before unit normalization. */
  scoreRange: [number, number];
}

/** Report text and section switches. */
export interface ReportOptions {
  title: string;
  attribution: string;
  modelsScannedLabel: string;
  noDataLabel: string;
  showLeaderSections: boolean;
  showProviderSections: boolean;
  /** Display overrides keyed by category key. */
  categoryLabels: Record<string, string>;
  /** Display overrides keyed by provider label. */
  providerLabels: Record<string, string>;
}

/** One-line notices delivered instead of a report. */
export interface NoticeOptions {
  noData: string;
  allFiltered: string;
  failed: string;
  error: string;
}

/** Fully resolved configuration passed explicitly into every component. */
export interface PipelineConfig {
  mode: ExtractMode;
  excludePattern: ExclusionPattern | null;
  columnAliases: AliasTable;
  categories: CategoryDefinition[];
  preferredMetricSuffixes: string[];
  jsonContainers: string[];
  providers: ProviderDefinition[];
  fallbackProvider: string;
  scraped: ScrapedOptions;
  topK: number;
  chunkBudgetBytes: number;
  report: ReportOptions;
  notices: NoticeOptions;
}

/** Partial configuration layer read from one YAML document or the CLI. */
export interface PipelineConfigOverrides {
  mode?: ExtractMode;
  excludePattern?: ExclusionPattern | null;
  columnAliases?: AliasTable;
  categories?: CategoryDefinition[];
  preferredMetricSuffixes?: string[];
  jsonContainers?: string[];
  providers?: ProviderDefinition[];
  fallbackProvider?: string;
  scraped?: Partial<ScrapedOptions>;
  topK?: number;
  chunkBudgetBytes?: number;
  report?: Partial<ReportOptions>;
  notices?: Partial<NoticeOptions>;
}
