import { beforeAll, describe, expect, it } from 'vitest';

import { loadDefaultConfig } from '../../src/config/config-loader.js';
import type { PipelineConfig } from '../../src/config/types.js';
import { createExtractContext } from '../../src/extract/extract-context.js';
import {
  cleanCellText,
  extractTableRecords,
  findTables,
  isSeparatorRow,
  splitRow
} from '../../src/extract/markdown-table.js';

const README = [
  '# Leaderboard',
  '',
  '| Rank | Notes |',
  '|------|-------|',
  '| 1 | decoy |',
  '',
  '| Model | Provider | HumanEval | MATH | GPQA |',
  '|:------|----------|----------:|-----:|-----:|',
  '| **GPT-4o** | OpenAI | 90.2% | 76.6 | 53.6 |',
  '| [Claude 3.5 Sonnet](https://example.com/claude) |  | 92.0 | 71.1 | 59.4 |',
  '|  | OpenAI | 10 | 10 | 10 |',
  '| Gemini 1.5 Pro | Google | — | 86.5 | 46.2 |',
  '',
  '| Model | HumanEval |',
  '|---|---|',
  '| Later Model | 99 |'
].join('\n');

describe('markdown table extraction', () => {
  let config: PipelineConfig;

  beforeAll(async () => {
    config = await loadDefaultConfig();
  });

  it('splits rows with escaped pipes and empty cells', () => {
    expect(splitRow('| a \\| b | c |')).toEqual(['a | b', 'c']);
    expect(splitRow('|  | x |')).toEqual(['', 'x']);
  });

  it('recognizes separator rows', () => {
    expect(isSeparatorRow('|:---|---:|')).toBe(true);
    expect(isSeparatorRow('| a | b |')).toBe(false);
  });

  it('reduces inline markdown in cells', () => {
    expect(cleanCellText('`o1-mini`')).toBe('o1-mini');
    expect(cleanCellText('**GPT-4o**')).toBe('GPT-4o');
    expect(cleanCellText('[x](https://example.com) extra')).toBe('x extra');
  });

  it('finds every table with its header line', () => {
    const tables = findTables(README);
    expect(tables.map((table) => table.line)).toEqual([3, 7, 14]);
    expect(tables[1]?.rows).toHaveLength(4);
  });

  it('skips the decoy table and reads the first candidate only', () => {
    const ctx = createExtractContext('lenient', 'README.md');
    const extraction = extractTableRecords(README, config, ctx);

    expect(extraction.tablesFound).toBe(3);
    expect(extraction.rowsParsed).toBe(4);
    expect(extraction.rowsDropped).toBe(1);
    expect(extraction.records.map((record) => record.name)).toEqual(['GPT-4o', 'Claude 3.5 Sonnet', 'Gemini 1.5 Pro']);

    const [gpt, claude, gemini] = extraction.records;
    expect(gpt?.categoryKey).toBe('OpenAI');
    expect(gpt?.origin).toEqual({ kind: 'table', name: 'README.md', line: 9 });
    expect(gpt?.readings.map((reading) => reading.key)).toEqual(['humaneval', 'gpqa', 'math']);
    expect(gpt?.readings[0]?.value).toBeCloseTo(0.902, 10);
    expect(claude?.categoryKey).toBeUndefined();
    expect(gemini?.readings[0]?.value).toBeUndefined();

    expect(ctx.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['TABLE_REJECTED', 'TABLE_SELECTED', 'ROW_DROPPED']);
    expect(ctx.diagnostics[2]?.source).toEqual({ name: 'README.md', line: 11 });
  });

  it('warns when no table is a candidate', () => {
    const ctx = createExtractContext();
    const extraction = extractTableRecords('| Rank | Notes |\n|---|---|\n| 1 | x |', config, ctx);

    expect(extraction.records).toEqual([]);
    expect(extraction.tablesFound).toBe(1);
    expect(ctx.diagnostics.at(-1)).toEqual({
      code: 'NO_CANDIDATE_TABLE',
      severity: 'warning',
      message: 'No leaderboard table found among 1 markdown table(s).'
    });
  });

  it('escalates the missing table warning in strict mode', () => {
    const ctx = createExtractContext('strict');
    extractTableRecords('no tables here', config, ctx);

    expect(ctx.validationFailure).toBe(true);
    expect(ctx.diagnostics.at(-1)?.severity).toBe('error');
  });
});
