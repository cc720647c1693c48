import { beforeAll, describe, expect, it } from 'vitest';

import { loadDefaultConfig } from '../../src/config/config-loader.js';
import type { PipelineConfig } from '../../src/config/types.js';
import type { CanonicalRecord, MetricValue } from '../../src/core/record.js';
import { createExtractContext } from '../../src/extract/extract-context.js';
import {
  aggregate,
  applyExclusion,
  compositeScore,
  createExclusionFilter,
  deriveCategoryScore,
  groupByProvider,
  rankLeaders,
  toCanonicalRecord
} from '../../src/pipeline/aggregate.js';
import { compileProviderClassifier } from '../../src/pipeline/classifier.js';

/** Canonical record with every default category present as a key. */
function record(name: string, provider: string, scores: Partial<Record<string, number>>): CanonicalRecord {
  const metrics: Record<string, MetricValue> = { coding: undefined, math: undefined, knowledge: undefined, multimodal: undefined };
  for (const [key, value] of Object.entries(scores)) {
    metrics[key] = value;
  }
  return { name, provider, metrics };
}

describe('aggregation', () => {
  let config: PipelineConfig;

  beforeAll(async () => {
    config = await loadDefaultConfig();
  });

  const records = [
    record('A', 'OpenAI', { coding: 0.8, knowledge: 0.6 }),
    record('B', 'OpenAI', {}),
    record('C', 'OpenAI', { coding: 0.9, knowledge: 0.9 }),
    record('D', 'Anthropic', { coding: 0.85 })
  ];

  it('averages present metrics and scores empty records as zero', () => {
    expect(compositeScore({ a: 0.5, b: undefined, c: 1 })).toBe(0.75);
    expect(compositeScore({ a: undefined })).toBe(0);
  });

  it('groups by provider in encounter order and sorts by composite', () => {
    const groups = groupByProvider(records);

    expect(groups.map((group) => group.id)).toEqual(['provider/OpenAI', 'provider/Anthropic']);
    expect(groups[0]?.entries.map((entry) => entry.name)).toEqual(['C', 'A', 'B']);
    expect(groups[0]?.entries[2]?.score).toBe(0);
  });

  it('produces the same groups on repeated runs', () => {
    expect(groupByProvider(records)).toEqual(groupByProvider(records));
  });

  it('ranks top-K leaders per category and leaves missing scores out', () => {
    const leaders = rankLeaders(records, config.categories, 2);

    expect(leaders.map((group) => group.id)).toEqual([
      'leaders/coding',
      'leaders/math',
      'leaders/knowledge',
      'leaders/multimodal'
    ]);
    expect(leaders[0]?.entries.map((entry) => entry.name)).toEqual(['C', 'D']);
    expect(leaders[1]?.entries).toEqual([]);
  });

  it('keeps the first entry for repeated names', () => {
    const leaders = rankLeaders([...records, record('C', 'OpenAI', { coding: 0.95 })], config.categories, 5);
    expect(leaders[0]?.entries.map((entry) => [entry.name, entry.score])).toEqual([
      ['C', 0.95],
      ['D', 0.85],
      ['A', 0.8]
    ]);
  });

  it('excludes names matching the default pattern before scoring', () => {
    const names = ['Mixtral 8x22B', 'Llama 3.1 405B', 'GPT-4o', 'Phi-3', 'Yi-Large', 'Gemma 2'].map((name) => ({ name }));
    const { kept, excluded } = applyExclusion(names, createExclusionFilter(config));

    expect(kept.map((item) => item.name)).toEqual(['GPT-4o']);
    expect(excluded).toHaveLength(5);
  });

  it('keeps everything when the pattern is disabled and forces case-insensitive flags', () => {
    expect(applyExclusion([{ name: 'Llama' }], createExclusionFilter({ excludePattern: null })).kept).toHaveLength(1);
    expect(createExclusionFilter({ excludePattern: { source: 'foo', flags: 'g' } }).pattern?.flags).toBe('i');
    expect(createExclusionFilter({ excludePattern: { source: 'foo', flags: 'ysmg' } }).pattern?.flags).toBe('ims');
  });

  it('matches every record alike when the configured flags include sticky', () => {
    const filter = createExclusionFilter({ excludePattern: { source: 'llama', flags: 'y' } });
    const { kept, excluded } = applyExclusion([{ name: 'llama-a' }, { name: 'llama-b' }, { name: 'llama-c' }], filter);

    expect(kept).toEqual([]);
    expect(excluded.map((record) => record.name)).toEqual(['llama-a', 'llama-b', 'llama-c']);
  });

  it('ignores out-of-range readings', () => {
    const coding = config.categories[0];
    expect(coding?.key).toBe('coding');
    if (!coding) {
      return;
    }

    const rejected: number[] = [];
    const score = deriveCategoryScore(
      [
        { key: 'humaneval', value: 1.5 },
        { key: 'humaneval', value: 0.7 },
        { key: 'gpqa', value: 0.99 }
      ],
      coding,
      config.preferredMetricSuffixes,
      (reading) => rejected.push(reading.value ?? Number.NaN)
    );

    expect(score).toBe(0.7);
    expect(rejected).toEqual([1.5]);
  });

  it('classifies and reports out-of-range values while canonicalizing', () => {
    const ctx = createExtractContext();
    const canonical = toCanonicalRecord(
      {
        name: 'Claude 3 Opus',
        origin: { kind: 'table', name: 'README.md', line: 4 },
        readings: [
          { key: 'humaneval', value: 1.5 },
          { key: 'math', value: 0.6 }
        ]
      },
      config,
      compileProviderClassifier(config),
      ctx
    );

    expect(canonical).toEqual({
      name: 'Claude 3 Opus',
      provider: 'Anthropic',
      metrics: { coding: undefined, math: 0.6, knowledge: undefined, multimodal: undefined }
    });
    expect(ctx.diagnostics).toEqual([
      {
        code: 'OUT_OF_RANGE_SCORE',
        severity: 'warning',
        message: "Ignoring out-of-range value 1.5 for 'Claude 3 Opus'.",
        source: { name: 'README.md', line: 4 },
        path: 'humaneval'
      }
    ]);
  });

  it('builds leader and provider groups together', () => {
    const result = aggregate(records, config);
    expect(result.leaderGroups).toHaveLength(4);
    expect(result.providerGroups).toHaveLength(2);
  });
});
