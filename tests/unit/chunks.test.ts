import { describe, expect, it } from 'vitest';

import { byteLength, chunkSize, packChunks, splitLineToBudget } from '../../src/render/chunks.js';

const HEADER = ['H'.repeat(10)];

describe('chunk packing', () => {
  it('measures UTF-8 bytes', () => {
    expect(byteLength('abc')).toBe(3);
    expect(byteLength('é')).toBe(2);
    expect(byteLength('📊')).toBe(4);
    expect(chunkSize(['ab', 'c'])).toBe(4);
  });

  it('closes a chunk when the next block does not fit', () => {
    const [a, b, c] = ['a', 'b', 'c'].map((letter) => [letter.repeat(40)]);
    const chunks = packChunks(HEADER, [a ?? [], b ?? [], c ?? []], [], 100);

    expect(chunks).toEqual([
      [HEADER[0], 'a'.repeat(40), 'b'.repeat(40)],
      [HEADER[0], 'c'.repeat(40)]
    ]);
    for (const chunk of chunks) {
      expect(chunkSize(chunk)).toBeLessThanOrEqual(100);
    }
  });

  it('puts the footer on the last chunk', () => {
    const chunks = packChunks(HEADER, [['a'.repeat(40)], ['b'.repeat(40)], ['c'.repeat(40)]], ['src'], 100);
    expect(chunks.at(-1)).toEqual([HEADER[0], 'c'.repeat(40), 'src']);
  });

  it('falls back to lines for a block larger than a chunk', () => {
    const chunks = packChunks(HEADER, [['y'.repeat(60), 'z'.repeat(60)]], [], 100);
    expect(chunks).toEqual([
      [HEADER[0], 'y'.repeat(60)],
      [HEADER[0], 'z'.repeat(60)]
    ]);
  });

  it('drops the header when it cannot share a chunk with a line', () => {
    expect(packChunks(HEADER, [['v'.repeat(95)]], [], 100)).toEqual([['v'.repeat(95)]]);
  });

  it('splits a line larger than the budget without losing text', () => {
    const line = 'w'.repeat(250);
    const chunks = packChunks([], [[line]], [], 100);

    expect(chunks.map((chunk) => chunk.join(''))).toEqual(['w'.repeat(100), 'w'.repeat(100), 'w'.repeat(50)]);
    expect(chunks.flat().join('')).toBe(line);
  });

  it('splits on code points', () => {
    expect(splitLineToBudget('ééé', 4)).toEqual(['éé', 'é']);
    expect(splitLineToBudget('short', 10)).toEqual(['short']);
  });

  it('returns the header alone when there is nothing to pack', () => {
    expect(packChunks(['T'], [], [], 100)).toEqual([['T']]);
  });
});
