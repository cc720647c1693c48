import type { PipelineConfig } from '../config/types.js';
import type { MetricReading, RawRecord } from '../core/record.js';
import { addDiagnostic, type ExtractContext } from './extract-context.js';
import { normalizeScore } from './numeric.js';
import { mapHeader, type ColumnMapping } from './schema-mapper.js';

/** One pipe-delimited table found in a markdown document. */
export interface MarkdownTable {
  header: string[];
  rows: MarkdownRow[];
  /** 1-based line of the header row. */
  line: number;
}

/** One body row with its 1-based source line. */
export interface MarkdownRow {
  cells: string[];
  line: number;
}

/** Table chosen by the greedy first-candidate scan. */
export interface SelectedTable {
  table: MarkdownTable;
  index: number;
  mapping: ColumnMapping;
}

/** Table extraction output with counters for the run summary. */
export interface TableExtraction {
  records: RawRecord[];
  tablesFound: number;
  rowsParsed: number;
  rowsDropped: number;
}

/** True for a trimmed line delimited by `|` at both ends with an interior `|`. */
export function isTableRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= 3 && trimmed.startsWith('|') && trimmed.endsWith('|') && trimmed.slice(1, -1).includes('|');
}

/** True for a header/body boundary such as `|---|:--:|`. */
export function isSeparatorRow(line: string): boolean {
  if (!isTableRow(line)) {
    return false;
  }

  const trimmed = line.trim();
  return /^[|\-:\s]+$/.test(trimmed) && trimmed.includes('-');
}

/**
 * Split a table row into trimmed cells. Outer pipes are stripped and `\|`
 * stays inside its cell; empty cells are kept so positions line up with the
 * header.
 */
export function splitRow(line: string): string[] {
  const trimmed = line.trim();
  const inner = trimmed.slice(trimmed.startsWith('|') ? 1 : 0, trimmed.endsWith('|') ? -1 : undefined);

  const cells: string[] = [];
  let current = '';
  for (let index = 0; index < inner.length; index += 1) {
    const char = inner.charAt(index);
    if (char === '\\' && inner.charAt(index + 1) === '|') {
      current += '|';
      index += 1;
      continue;
    }
    if (char === '|') {
      cells.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }
  cells.push(current.trim());

  return cells;
}

/** Reduce inline markdown in a cell (links, emphasis, code) to its text. */
export function cleanCellText(cell: string): string {
  let text = cell.replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1').trim();
  const emphasis = /^(\*\*|__|\*|`)(.+)\1$/.exec(text);
  if (emphasis?.[2]) {
    text = emphasis[2].trim();
  }
  return text;
}

/**
 * Find every pipe-delimited table. A table starts at a row followed by a
 * separator row; the contiguous rows after the separator are its body, and the
 * scan resumes after the whole block.
 */
export function findTables(markdown: string): MarkdownTable[] {
  const lines = markdown.split(/\r?\n/);
  const tables: MarkdownTable[] = [];

  let index = 0;
  while (index < lines.length - 1) {
    const headerLine = lines[index] ?? '';
    const boundaryLine = lines[index + 1] ?? '';
    if (!isTableRow(headerLine) || isSeparatorRow(headerLine) || !isSeparatorRow(boundaryLine)) {
      index += 1;
      continue;
    }

    const rows: MarkdownRow[] = [];
    let cursor = index + 2;
    while (cursor < lines.length && isTableRow(lines[cursor] ?? '')) {
      const rowLine = lines[cursor] ?? '';
      if (!isSeparatorRow(rowLine)) {
        rows.push({ cells: splitRow(rowLine), line: cursor + 1 });
      }
      cursor += 1;
    }

    tables.push({ header: splitRow(headerLine), rows, line: index + 1 });
    index = cursor;
  }

  return tables;
}

/**
 * Pick the first table whose header is a schema candidate.
 * This is a greedy choice: a better-scoring table later in the document is
 * never considered once an earlier candidate exists.
 */
export function selectTable(
  tables: readonly MarkdownTable[],
  config: PipelineConfig,
  ctx: ExtractContext
): SelectedTable | undefined {
  for (let index = 0; index < tables.length; index += 1) {
    const table = tables[index];
    if (!table) {
      continue;
    }

    const mapping = mapHeader(table.header, config.columnAliases);
    if (mapping.kind === 'candidate') {
      return { table, index, mapping };
    }

    addDiagnostic(
      ctx,
      'TABLE_REJECTED',
      'info',
      `Table #${index + 1} is not a leaderboard table (${mapping.reason}); columns: ${mapping.labels.join(', ')}.`,
      { line: table.line }
    );
  }

  return undefined;
}

/** Extract raw records from the first candidate table in a markdown document. */
export function extractTableRecords(markdown: string, config: PipelineConfig, ctx: ExtractContext): TableExtraction {
  const tables = findTables(markdown);
  const selected = selectTable(tables, config, ctx);
  if (!selected) {
    addDiagnostic(
      ctx,
      'NO_CANDIDATE_TABLE',
      'warning',
      `No leaderboard table found among ${tables.length} markdown table(s).`
    );
    return { records: [], tablesFound: tables.length, rowsParsed: 0, rowsDropped: 0 };
  }

  addDiagnostic(
    ctx,
    'TABLE_SELECTED',
    'info',
    `Using table #${selected.index + 1} with columns: ${[...selected.mapping.columns.entries()]
      .map(([field, position]) => `${field}=${position}`)
      .join(', ')}.`,
    { line: selected.table.line }
  );

  const records: RawRecord[] = [];
  let rowsDropped = 0;
  for (const row of selected.table.rows) {
    const record = rowToRecord(row, selected.mapping, ctx);
    if (record) {
      records.push(record);
    } else {
      rowsDropped += 1;
    }
  }

  return {
    records,
    tablesFound: tables.length,
    rowsParsed: selected.table.rows.length,
    rowsDropped
  };
}

/** Convert one body row; rows without a usable name are dropped. */
function rowToRecord(row: MarkdownRow, mapping: ColumnMapping, ctx: ExtractContext): RawRecord | undefined {
  const name = cleanCellText(row.cells[mapping.nameColumn] ?? '');
  if (name.length === 0) {
    addDiagnostic(ctx, 'ROW_DROPPED', 'info', 'Table row has no model name.', { line: row.line });
    return undefined;
  }

  const readings: MetricReading[] = mapping.metricFields.map((field) => {
    const position = mapping.columns.get(field);
    const cell = position === undefined ? undefined : row.cells[position];
    return { key: field, value: normalizeScore(cell) };
  });

  const record: RawRecord = {
    name,
    origin: { kind: 'table', name: ctx.sourceName, line: row.line },
    readings
  };

  const provider = mapping.providerColumn === undefined ? undefined : row.cells[mapping.providerColumn]?.trim();
  if (provider) {
    record.categoryKey = provider;
  }

  return record;
}
