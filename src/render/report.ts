import type { CategoryDefinition, NoticeOptions, PipelineConfig } from '../config/types.js';
import type { AggregateResult, Movement, MovementMap, RankedEntry, RankedGroup } from '../core/record.js';
import { formatPercent } from '../extract/numeric.js';
import { packChunks } from './chunks.js';

/** Prefix of a section header line; `readSectionOrder` relies on it. */
export const SECTION_PREFIX = '— ';
/** Suffix of a section header line. */
export const SECTION_SUFFIX = ':';

/** One rendered report section. */
export interface ReportSection {
  groupId: string;
  label: string;
  lines: string[];
}

/** Inputs to report rendering beyond configuration. */
export interface ReportInput {
  aggregate: AggregateResult;
  movements?: MovementMap;
  modelCount: number;
}

/** Outcomes that replace the report with a one-line notice. */
export type FailureNoticeKind = 'no-data' | 'all-filtered' | 'failed' | 'error';

/** Render a movement marker such as ` ▲1 (+2.0)`, ` =`, or ` 🆕`. */
export function formatMovement(movement: Movement | undefined): string {
  if (!movement) {
    return '';
  }

  switch (movement.kind) {
    case 'new':
      return ' 🆕';
    case 'up':
      return ` ▲${movement.places}${formatDelta(movement.delta)}`;
    case 'down':
      return ` ▼${movement.places}${formatDelta(movement.delta)}`;
    case 'unchanged':
      return ` =${formatDelta(movement.delta)}`;
  }
}

/** Render a non-zero score delta as ` (+2.0)`. */
function formatDelta(delta: number | undefined): string {
  if (delta === undefined || delta === 0) {
    return '';
  }
  return ` (${delta > 0 ? '+' : ''}${delta.toFixed(1)})`;
}

/** Display label for a category key. */
export function categoryLabel(category: CategoryDefinition, config: PipelineConfig): string {
  return config.report.categoryLabels[category.key] ?? category.label;
}

/** Display label for a provider. */
export function providerLabel(provider: string, config: PipelineConfig): string {
  return config.report.providerLabels[provider] ?? provider;
}

/** Build a section header line. */
export function sectionHeader(label: string): string {
  return `${SECTION_PREFIX}${label}${SECTION_SUFFIX}`;
}

/**
 * Order provider groups for display: the configured precedence first, then
 * explicit provider values outside that list in encounter order, then the
 * fallback label.
 */
export function orderProviderGroups(groups: readonly RankedGroup[], config: PipelineConfig): RankedGroup[] {
  const byKey = new Map(groups.map((group) => [group.key, group]));
  const ordered: RankedGroup[] = [];

  for (const provider of config.providers) {
    const group = byKey.get(provider.label);
    if (group) {
      ordered.push(group);
      byKey.delete(provider.label);
    }
  }

  const fallback = byKey.get(config.fallbackProvider);
  byKey.delete(config.fallbackProvider);
  ordered.push(...byKey.values());
  if (fallback) {
    ordered.push(fallback);
  }

  return ordered;
}

/** Render one leader section: ranked entries for a single category. */
export function renderLeaderSection(
  group: RankedGroup,
  category: CategoryDefinition,
  movements: readonly Movement[] | undefined,
  config: PipelineConfig
): ReportSection {
  const label = categoryLabel(category, config);
  const lines = [sectionHeader(label)];

  if (group.entries.length === 0) {
    lines.push(`  • ${config.report.noDataLabel}`);
  }
  group.entries.forEach((entry, index) => {
    lines.push(`  ${index + 1}. ${entry.name}: ${formatPercent(entry.score)}${formatMovement(movements?.[index])}`);
  });
  lines.push('');

  return { groupId: group.id, label, lines };
}

/** Render one provider section listing every entity with all category scores. */
export function renderProviderSection(
  group: RankedGroup,
  movements: readonly Movement[] | undefined,
  config: PipelineConfig
): ReportSection {
  const label = providerLabel(group.key, config);
  const lines = [sectionHeader(label)];

  group.entries.forEach((entry, index) => {
    lines.push(`  • ${entry.name}: ${formatMetrics(entry, config)}${formatMovement(movements?.[index])}`);
  });
  lines.push('');

  return { groupId: group.id, label, lines };
}

/** Every category score of one entity, comma separated. */
function formatMetrics(entry: RankedEntry, config: PipelineConfig): string {
  return config.categories
    .map((category) => `${categoryLabel(category, config)} ${formatPercent(entry.metrics[category.key])}`)
    .join(', ');
}

/** Render all sections in display order: leaders by category order, then providers. */
export function renderSections(input: ReportInput, config: PipelineConfig): ReportSection[] {
  const sections: ReportSection[] = [];

  if (config.report.showLeaderSections) {
    const leadersById = new Map(input.aggregate.leaderGroups.map((group) => [group.id, group]));
    for (const category of config.categories) {
      const group: RankedGroup = leadersById.get(`leaders/${category.key}`) ?? {
        id: `leaders/${category.key}`,
        kind: 'leaders',
        key: category.key,
        entries: []
      };
      sections.push(renderLeaderSection(group, category, input.movements?.[group.id], config));
    }
  }

  if (config.report.showProviderSections) {
    for (const group of orderProviderGroups(input.aggregate.providerGroups, config)) {
      sections.push(renderProviderSection(group, input.movements?.[group.id], config));
    }
  }

  return sections;
}

/** Header lines repeated at the top of every chunk. */
export function renderReportHeader(modelCount: number, config: PipelineConfig): string[] {
  return [config.report.title, `${config.report.modelsScannedLabel}: ${modelCount}`, ''];
}

/** Render the full report as size-bounded chunk texts. */
export function renderReport(input: ReportInput, config: PipelineConfig): string[] {
  const sections = renderSections(input, config);
  const chunks = packChunks(
    renderReportHeader(input.modelCount, config),
    sections.map((section) => section.lines),
    [config.report.attribution],
    config.chunkBudgetBytes
  );
  return chunks.map((lines) => lines.join('\n'));
}

/** Read section labels back from a rendered chunk, in order. */
export function readSectionOrder(chunk: string): string[] {
  return chunk
    .split('\n')
    .filter((line) => line.startsWith(SECTION_PREFIX) && line.endsWith(SECTION_SUFFIX))
    .map((line) => line.slice(SECTION_PREFIX.length, -SECTION_SUFFIX.length));
}

/**
 * One-line notice sent instead of a report. "No data" and "everything filtered"
 * read differently so a misconfigured exclusion pattern is visible.
 */
export function renderFailureNotice(kind: FailureNoticeKind, notices: NoticeOptions, detail?: string): string {
  switch (kind) {
    case 'no-data':
      return notices.noData;
    case 'all-filtered':
      return notices.allFiltered;
    case 'failed':
      return detail ? `${notices.failed} ${detail.slice(0, 350)}` : notices.failed;
    case 'error':
      return detail ? `${notices.error}: ${detail.slice(0, 350)}` : notices.error;
  }
}
