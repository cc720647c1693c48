import type { PipelineConfig } from '../config/types.js';
import type { RawRecord } from '../core/record.js';
import { addDiagnostic, type ExtractContext } from './extract-context.js';
import { extractDocumentRecords, type JsonDocumentInput } from './json-documents.js';
import { extractTableRecords } from './markdown-table.js';
import { extractSectionRecords } from './scraped-segments.js';
import { normalizeLabel } from './schema-mapper.js';

/** Markdown text believed to hold one or more leaderboard tables. */
export interface MarkdownSource {
  kind: 'markdown';
  text: string;
  sourceName?: string;
}

/** Parsed JSON documents, one per model. */
export interface JsonSource {
  kind: 'json';
  documents: JsonDocumentInput[];
  sourceName?: string;
}

/** Scraped section text keyed by the category label of the section. */
export interface ScrapedSource {
  kind: 'scraped';
  sections: Record<string, string>;
  sourceName?: string;
}

/** Every supported source shape; all are treated as equally untrusted. */
export type SourceInput = MarkdownSource | JsonSource | ScrapedSource;

/** Adapter output plus the counters reported in run summaries. */
export interface ExtractionResult {
  records: RawRecord[];
  /** Tables (markdown), documents (json) or sections (scraped) seen. */
  blocksFound: number;
  /** Rows, documents or segments considered. */
  rowsParsed: number;
  /** Rows, documents or segments dropped for lacking a name or score. */
  dropped: number;
}

/** Route a source to its adapter and return raw records. */
export function extractRecords(input: SourceInput, config: PipelineConfig, ctx: ExtractContext): ExtractionResult {
  switch (input.kind) {
    case 'markdown': {
      const extraction = extractTableRecords(input.text, config, ctx);
      return {
        records: extraction.records,
        blocksFound: extraction.tablesFound,
        rowsParsed: extraction.rowsParsed,
        dropped: extraction.rowsDropped
      };
    }
    case 'json': {
      const { records, dropped } = extractDocumentRecords(input.documents, config, ctx);
      return {
        records,
        blocksFound: input.documents.length,
        rowsParsed: input.documents.length,
        dropped
      };
    }
    case 'scraped':
      return extractScrapedRecords(input, config, ctx);
  }
}

/**
 * Read each scraped section whose label resolves to a configured category
 * (by key, label or localized label), then merge entities found in several sections by name.
 */
function extractScrapedRecords(input: ScrapedSource, config: PipelineConfig, ctx: ExtractContext): ExtractionResult {
  const merged = new Map<string, RawRecord>();
  let rowsParsed = 0;
  let dropped = 0;
  let blocksFound = 0;

  for (const [label, text] of Object.entries(input.sections)) {
    const wanted = normalizeLabel(label);
    const category = config.categories.find((candidate) =>
      [candidate.key, candidate.label, config.report.categoryLabels[candidate.key] ?? ''].some(
        (known) => normalizeLabel(known) === wanted
      )
    );
    if (!category) {
      addDiagnostic(ctx, 'UNKNOWN_SECTION', 'warning', `Scraped section '${label}' does not match any category.`);
      continue;
    }

    blocksFound += 1;
    const section = extractSectionRecords(category.key, label, text, config.scraped, ctx);
    rowsParsed += section.records.length + section.dropped;
    dropped += section.dropped;

    for (const record of section.records) {
      const existing = merged.get(record.name);
      if (existing) {
        existing.readings.push(...record.readings);
      } else {
        merged.set(record.name, record);
      }
    }
  }

  return { records: [...merged.values()], blocksFound, rowsParsed, dropped };
}
