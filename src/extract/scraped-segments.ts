import type { ScrapedOptions } from '../config/types.js';
import type { MetricValue, RawRecord } from '../core/record.js';
import { addDiagnostic, type ExtractContext } from './extract-context.js';
import { extractAllNumbers, toUnitScale } from './numeric.js';
import { normalizeLabel } from './schema-mapper.js';

/** Position of one rank marker inside a line list. */
export interface RankMarker {
  rank: number;
  lineIndex: number;
}

/** One ranked entity read from a scraped section. */
export interface ScrapedEntry {
  rank: number;
  name: string;
  score: number;
}

/** Segment scan output for one section. */
export interface SegmentExtraction {
  entries: ScrapedEntry[];
  dropped: number;
}

/** Split text into trimmed, whitespace-collapsed, non-empty lines. */
export function toLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

/** Parse a rank marker line: `1`, `1.`, `1)`, `#1`, `1 -`. */
export function parseRankMarker(line: string): number | undefined {
  const match = /^#?(\d{1,3})\s*[.):\-–—]?$/.exec(line.trim());
  if (!match?.[1]) {
    return undefined;
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Locate rank markers 1, 2, 3 … in order. Looking for the next expected rank
 * only keeps numbers inside a segment from being taken for a later marker.
 */
export function findRankMarkers(lines: readonly string[], maxRank: number): RankMarker[] {
  const markers: RankMarker[] = [];
  let expected = 1;

  for (let lineIndex = 0; lineIndex < lines.length && expected <= maxRank; lineIndex += 1) {
    if (parseRankMarker(lines[lineIndex] ?? '') === expected) {
      markers.push({ rank: expected, lineIndex });
      expected += 1;
    }
  }

  return markers;
}

/** Share of a line's non-space characters that are digits. */
export function digitDensity(line: string): number {
  const compact = line.replace(/\s+/g, '');
  if (compact.length === 0) {
    return 0;
  }
  const digits = compact.replace(/\D/g, '').length;
  return digits / compact.length;
}

/** True when `line` equals or repeats the section title. */
export function isTitleLine(line: string, title: string): boolean {
  const normalizedTitle = normalizeLabel(title);
  if (normalizedTitle.length === 0) {
    return false;
  }
  return normalizeLabel(line).includes(normalizedTitle);
}

/**
 * Read ranked entries from one scraped section.
 *
 * Each segment runs from its rank marker to the next marker, or to the end of
 * the text. The name is the first line that is not a title line, contains a
 * letter and is at most half digits. The score is the first number within the
 * first `scanLines` lines (name line excluded) that lies in `scoreRange`.
 * Segments missing either are dropped and counted.
 */
export function extractSegments(
  lines: readonly string[],
  title: string,
  options: ScrapedOptions,
  ctx: ExtractContext
): SegmentExtraction {
  const markers = findRankMarkers(lines, options.rankMarkers);
  const entries: ScrapedEntry[] = [];
  let dropped = 0;

  for (let index = 0; index < markers.length; index += 1) {
    const marker = markers[index];
    if (!marker) {
      continue;
    }

    const end = markers[index + 1]?.lineIndex ?? lines.length;
    const segment = lines.slice(marker.lineIndex + 1, end);

    const nameIndex = segment.findIndex(
      (line) => !isTitleLine(line, title) && /\p{L}/u.test(line) && digitDensity(line) <= 0.5
    );
    const name = nameIndex === -1 ? undefined : segment[nameIndex];
    const score = findSegmentScore(segment, nameIndex, options);

    if (name === undefined || score === undefined) {
      dropped += 1;
      addDiagnostic(
        ctx,
        'SEGMENT_DROPPED',
        'info',
        `Rank ${marker.rank} in '${title}' has no ${name === undefined ? 'name' : 'score'}.`
      );
      continue;
    }

    entries.push({ rank: marker.rank, name, score });
  }

  return { entries, dropped };
}

/** First in-range number in the scanned lines, unit-normalized. */
function findSegmentScore(segment: readonly string[], nameIndex: number, options: ScrapedOptions): MetricValue {
  const [min, max] = options.scoreRange;
  const scanned = segment.slice(0, options.scanLines);

  for (let index = 0; index < scanned.length; index += 1) {
    if (index === nameIndex) {
      continue;
    }
    for (const value of extractAllNumbers(scanned[index] ?? '')) {
      if (value >= min && value <= max) {
        return toUnitScale(value);
      }
    }
  }

  return undefined;
}

/**
 * Split a rendered page's lines into sections at heading lines that match one
 * of `titles` exactly (after label normalization). Lines before the first
 * heading are discarded.
 */
export function splitSectionsByTitle(lines: readonly string[], titles: readonly string[]): Record<string, string> {
  const byLabel = new Map(titles.map((title) => [normalizeLabel(title), title]));
  const sections: Record<string, string[]> = {};
  let current: string[] | undefined;

  for (const line of lines) {
    const title = byLabel.get(normalizeLabel(line));
    if (title !== undefined) {
      current = sections[title] ??= [];
      continue;
    }
    current?.push(line);
  }

  return Object.fromEntries(Object.entries(sections).map(([title, body]) => [title, body.join('\n')]));
}

/**
 * Turn a scraped section into raw records, one reading per entity keyed by the
 * category the section belongs to.
 */
export function extractSectionRecords(
  categoryKey: string,
  title: string,
  text: string,
  options: ScrapedOptions,
  ctx: ExtractContext
): { records: RawRecord[]; dropped: number } {
  const { entries, dropped } = extractSegments(toLines(text), title, options, ctx);
  const records = entries.map(
    (entry): RawRecord => ({
      name: entry.name,
      origin: { kind: 'scraped', name: title },
      readings: [{ key: categoryKey, value: entry.score }]
    })
  );
  return { records, dropped };
}
