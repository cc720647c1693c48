import type { PipelineConfig } from '../config/types.js';
import type { MetricReading, RawRecord } from '../core/record.js';
import { addDiagnostic, type ExtractContext } from './extract-context.js';
import { normalizeScore } from './numeric.js';

/** One parsed JSON document and the identifier it was loaded from. */
export interface JsonDocumentInput {
  id: string;
  document: unknown;
}

/** Document fields tried, in order, for the entity name. */
const NAME_KEYS = ['name', 'id'];
/** Document fields tried, in order, for an explicit provider. */
const PROVIDER_KEYS = ['provider', 'organization', 'organisation'];

/**
 * Flatten a JSON value into `path -> unit score` readings. Objects contribute
 * dotted segments and arrays `[i]`; leaves that do not parse as numbers are
 * skipped.
 */
export function flattenScores(value: unknown, path = ''): MetricReading[] {
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => flattenScores(item, `${path}[${index}]`));
  }

  if (isRecord(value)) {
    return Object.entries(value).flatMap(([key, child]) => flattenScores(child, path ? `${path}.${key}` : key));
  }

  const score = normalizeScore(value);
  return score === undefined ? [] : [{ key: path, value: score }];
}

/**
 * Convert one leaderboard JSON document into a raw record. Scores are read from
 * the configured container keys when present, otherwise from the whole
 * document. Paths are lowercased so keyword matching is case-insensitive.
 */
export function extractDocumentRecord(
  input: JsonDocumentInput,
  config: PipelineConfig,
  ctx: ExtractContext
): RawRecord | undefined {
  const { id, document } = input;
  if (!isRecord(document)) {
    addDiagnostic(ctx, 'DOCUMENT_NOT_OBJECT', 'warning', 'JSON document is not an object.', { name: id });
    return undefined;
  }

  const name = readFirstString(document, NAME_KEYS) ?? basename(id);
  if (name.length === 0) {
    addDiagnostic(ctx, 'DOCUMENT_DROPPED', 'info', 'JSON document has no usable model name.', { name: id });
    return undefined;
  }

  const containers = config.jsonContainers
    .filter((key) => Array.isArray(document[key]) || isRecord(document[key]))
    .map((key) => ({ key, value: document[key] }));

  const readings =
    containers.length > 0
      ? containers.flatMap((container) => flattenScores(container.value, container.key))
      : flattenScores(document);

  const record: RawRecord = {
    name,
    origin: { kind: 'json', name: id },
    readings: readings.map((reading) => ({ key: reading.key.toLowerCase(), value: reading.value }))
  };

  const provider = readFirstString(document, PROVIDER_KEYS);
  if (provider) {
    record.categoryKey = provider;
  }

  return record;
}

/** Convert every document, dropping the unusable ones with a diagnostic. */
export function extractDocumentRecords(
  documents: readonly JsonDocumentInput[],
  config: PipelineConfig,
  ctx: ExtractContext
): { records: RawRecord[]; dropped: number } {
  const records: RawRecord[] = [];
  let dropped = 0;
  for (const input of documents) {
    const record = extractDocumentRecord(input, config, ctx);
    if (record) {
      records.push(record);
    } else {
      dropped += 1;
    }
  }
  return { records, dropped };
}

/** First non-blank string among `keys`. */
function readFirstString(obj: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

/** Last path segment of an identifier, without a `.json` extension. */
function basename(id: string): string {
  const segment = id.split('/').pop() ?? id;
  return segment.replace(/\.json$/i, '').trim();
}

/** Narrow unknown JSON values to plain objects. */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
