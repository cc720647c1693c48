import type { MetricValue } from '../core/record.js';

/** First contiguous decimal token; an optional fractional part is included. */
const NUMBER_TOKEN = /[0-9]+(?:\.[0-9]+)?/;
/** All decimal tokens, for scans that need more than the first. */
const NUMBER_TOKENS = /[0-9]+(?:\.[0-9]+)?/g;

/** Placeholder shown for missing scores. */
export const MISSING_PLACEHOLDER = '—';

/**
 * Extract the first decimal number from a raw value.
 * Numbers pass through; strings lose `%` and thousands separators before the
 * scan. Anything unparseable is missing. Never throws.
 */
export function extractNumber(raw: unknown): MetricValue {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }

  if (typeof raw !== 'string') {
    return undefined;
  }

  const cleaned = raw.trim().replaceAll('%', '').replaceAll(',', '');
  const match = NUMBER_TOKEN.exec(cleaned);
  if (!match) {
    return undefined;
  }

  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Every decimal number in `text`, in order of appearance. */
export function extractAllNumbers(text: string): number[] {
  const cleaned = text.replaceAll(',', '');
  return [...cleaned.matchAll(NUMBER_TOKENS)]
    .map((match) => Number.parseFloat(match[0]))
    .filter((value) => Number.isFinite(value));
}

/**
 * Bring a value onto the unit scale: `(1, 100]` is read as a percentage and
 * divided by 100, everything else is returned unchanged. Values above 100 stay
 * out of range for callers to reject. Exactly 1 stays 1 while 100 becomes 1;
 * both mean "perfect" on their own scale.
 */
export function toUnitScale(value: number): number {
  return value > 1 && value <= 100 ? value / 100 : value;
}

/** Extract and unit-normalize a raw score. */
export function normalizeScore(raw: unknown): MetricValue {
  const value = extractNumber(raw);
  return value === undefined ? undefined : toUnitScale(value);
}

/** True when `value` is present and within `[0, 1]`. */
export function isUnitScore(value: MetricValue): value is number {
  return value !== undefined && value >= 0 && value <= 1;
}

/** Round to one decimal place. */
export function roundTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Unit score to percent points with one decimal (`0.8874 -> 88.7`). */
export function toPercentPoints(value: number): number {
  return roundTenth(value * 100);
}

/** Render a unit score as `88.7%` (always one decimal), or the missing placeholder. */
export function formatPercent(value: MetricValue): string {
  return value === undefined ? MISSING_PLACEHOLDER : `${toPercentPoints(value).toFixed(1)}%`;
}
