import { IDENTITY_FIELDS, type AliasTable } from '../config/types.js';

/** Why a header could not be used as a leaderboard table. */
export type HeaderRejectionReason = 'missing-identity' | 'missing-metrics';

/** Column positions for one accepted header, keyed by canonical field. */
export interface ColumnMapping {
  /** Canonical field -> zero-based column position, in alias-table order. */
  columns: Map<string, number>;
  nameColumn: number;
  providerColumn?: number;
  /** Raw metric fields that were found, in alias-table order. */
  metricFields: string[];
}

/** Schema mapping outcome for one header row. */
export type HeaderMapping =
  | ({ kind: 'candidate' } & ColumnMapping)
  | { kind: 'rejected'; reason: HeaderRejectionReason; labels: string[] };

/** Trim, collapse inner whitespace and lowercase a label for comparison. */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Map raw header labels onto canonical fields.
 *
 * Matching is exact after label normalization, so `math` never matches
 * `mathematics notes`. For each field the first alias present in the header
 * wins, at the first column carrying it; later duplicate columns are ignored.
 * A header must map the `name` field and at least one metric field to be a
 * candidate; anything else is rejected so callers can keep scanning.
 */
export function mapHeader(header: readonly string[], aliasTable: AliasTable): HeaderMapping {
  const labels = header.map(normalizeLabel);
  const columns = new Map<string, number>();

  for (const entry of aliasTable) {
    for (const alias of entry.aliases) {
      const position = labels.indexOf(normalizeLabel(alias));
      if (position !== -1) {
        columns.set(entry.field, position);
        break;
      }
    }
  }

  const nameColumn = columns.get('name');
  if (nameColumn === undefined) {
    return { kind: 'rejected', reason: 'missing-identity', labels };
  }

  const identity: readonly string[] = IDENTITY_FIELDS;
  const metricFields = [...columns.keys()].filter((field) => !identity.includes(field));
  if (metricFields.length === 0) {
    return { kind: 'rejected', reason: 'missing-metrics', labels };
  }

  return {
    kind: 'candidate',
    columns,
    nameColumn,
    providerColumn: columns.get('provider'),
    metricFields
  };
}
