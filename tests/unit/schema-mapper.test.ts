import { beforeAll, describe, expect, it } from 'vitest';

import { loadDefaultConfig } from '../../src/config/config-loader.js';
import type { AliasTable } from '../../src/config/types.js';
import { mapHeader, normalizeLabel } from '../../src/extract/schema-mapper.js';

describe('schema mapper', () => {
  let aliases: AliasTable;

  beforeAll(async () => {
    aliases = (await loadDefaultConfig()).columnAliases;
  });

  it('normalizes labels for comparison', () => {
    expect(normalizeLabel('  Model   Name ')).toBe('model name');
  });

  it('maps identity and metric columns in alias table order', () => {
    const mapping = mapHeader(['Model', 'Provider', 'HumanEval', 'MATH'], aliases);
    expect(mapping.kind).toBe('candidate');
    if (mapping.kind !== 'candidate') {
      return;
    }
    expect(mapping.nameColumn).toBe(0);
    expect(mapping.providerColumn).toBe(1);
    expect(mapping.metricFields).toEqual(['humaneval', 'math']);
    expect(mapping.columns.get('math')).toBe(3);
  });

  it('rejects headers without a name column', () => {
    const mapping = mapHeader(['Rank', 'Notes'], aliases);
    expect(mapping).toEqual({ kind: 'rejected', reason: 'missing-identity', labels: ['rank', 'notes'] });
  });

  it('rejects headers without any metric column', () => {
    const mapping = mapHeader(['Model', 'Release date'], aliases);
    expect(mapping.kind === 'rejected' ? mapping.reason : mapping.kind).toBe('missing-metrics');
  });

  it('matches labels exactly rather than by substring', () => {
    const mapping = mapHeader(['Model', 'Mathematics notes', 'GPQA'], aliases);
    expect(mapping.kind === 'candidate' ? mapping.metricFields : []).toEqual(['gpqa']);
  });

  it('keeps the first alias found when a field appears twice', () => {
    const mapping = mapHeader([' model  name ', 'HumanEval', 'Code'], aliases);
    expect(mapping.kind === 'candidate' ? mapping.columns.get('humaneval') : undefined).toBe(1);
    expect(mapping.kind === 'candidate' ? mapping.nameColumn : undefined).toBe(0);
  });
});
