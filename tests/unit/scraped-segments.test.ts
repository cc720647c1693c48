import { describe, expect, it } from 'vitest';

import type { ScrapedOptions } from '../../src/config/types.js';
import { createExtractContext } from '../../src/extract/extract-context.js';
import { htmlToLines } from '../../src/extract/html-lines.js';
import {
  digitDensity,
  extractSectionRecords,
  extractSegments,
  findRankMarkers,
  parseRankMarker,
  splitSectionsByTitle,
  toLines
} from '../../src/extract/scraped-segments.js';

const OPTIONS: ScrapedOptions = { rankMarkers: 10, scanLines: 6, scoreRange: [10, 100] };

const CODING_SECTION = [
  'Coding',
  '1',
  'GPT-4o',
  'OpenAI',
  '90.2%',
  '2',
  'Claude 3.5 Sonnet',
  '92.0',
  '3',
  '12345',
  '4',
  'o1-mini',
  'score 250'
].join('\n');

describe('anchored segment extraction', () => {
  it('parses rank marker shapes', () => {
    expect(parseRankMarker('#3')).toBe(3);
    expect(parseRankMarker('12.')).toBe(12);
    expect(parseRankMarker('1)')).toBe(1);
    expect(parseRankMarker('1000')).toBeUndefined();
    expect(parseRankMarker('GPT-4')).toBeUndefined();
  });

  it('finds markers in sequence only', () => {
    expect(findRankMarkers(['1', 'a', '3', '2', 'b', '3'], 10)).toEqual([
      { rank: 1, lineIndex: 0 },
      { rank: 2, lineIndex: 3 },
      { rank: 3, lineIndex: 5 }
    ]);
  });

  it('measures digit density over non-space characters', () => {
    expect(digitDensity('GPT-4o')).toBeCloseTo(1 / 6, 10);
    expect(digitDensity('12 34')).toBe(1);
    expect(digitDensity('')).toBe(0);
  });

  it('reads names and in-range scores and drops incomplete segments', () => {
    const ctx = createExtractContext();
    const { entries, dropped } = extractSegments(toLines(CODING_SECTION), 'Coding', OPTIONS, ctx);

    expect(entries.map((entry) => [entry.rank, entry.name])).toEqual([
      [1, 'GPT-4o'],
      [2, 'Claude 3.5 Sonnet']
    ]);
    expect(entries[0]?.score).toBeCloseTo(0.902, 10);
    expect(entries[1]?.score).toBeCloseTo(0.92, 10);
    expect(dropped).toBe(2);
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "Rank 3 in 'Coding' has no name.",
      "Rank 4 in 'Coding' has no score."
    ]);
  });

  it('keys section records by category', () => {
    const ctx = createExtractContext();
    const { records } = extractSectionRecords('coding', 'Coding', CODING_SECTION, OPTIONS, ctx);

    expect(records[0]?.name).toBe('GPT-4o');
    expect(records[0]?.origin).toEqual({ kind: 'scraped', name: 'Coding' });
    expect(records[0]?.readings.map((reading) => reading.key)).toEqual(['coding']);
  });

  it('splits page lines into titled sections', () => {
    expect(splitSectionsByTitle(['intro', 'Coding', '1', 'A', 'math', '1', 'B'], ['Coding', 'Math'])).toEqual({
      Coding: '1\nA',
      Math: '1\nB'
    });
  });

  it('turns rendered html into visible text lines', () => {
    const html =
      '<html><body><script>var x = 1;</script><h2>Coding</h2><ol><li><span>1</span><div>GPT-4o</div>' +
      '<p>90.2%</p></li></ol><p>Some <b>bold</b> text</p></body></html>';

    expect(htmlToLines(html)).toEqual(['Coding', '1', 'GPT-4o', '90.2%', 'Some bold text']);
  });
});
