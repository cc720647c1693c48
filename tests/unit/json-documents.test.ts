import { beforeAll, describe, expect, it } from 'vitest';

import { loadDefaultConfig } from '../../src/config/config-loader.js';
import type { PipelineConfig } from '../../src/config/types.js';
import { createExtractContext } from '../../src/extract/extract-context.js';
import { extractDocumentRecord, extractDocumentRecords, flattenScores } from '../../src/extract/json-documents.js';
import { deriveCategoryScore } from '../../src/pipeline/aggregate.js';

describe('json document extraction', () => {
  let config: PipelineConfig;

  beforeAll(async () => {
    config = await loadDefaultConfig();
  });

  it('flattens nested objects and arrays into dotted paths', () => {
    expect(flattenScores({ a: { b: '50%' }, c: [0.3, 'x'] })).toEqual([
      { key: 'a.b', value: 0.5 },
      { key: 'c[0]', value: 0.3 }
    ]);
  });

  it('reads scores from container keys with lowercased paths', () => {
    const ctx = createExtractContext();
    const record = extractDocumentRecord(
      {
        id: 'models/openai/gpt-4o.json',
        document: {
          name: 'GPT-4o',
          organization: 'OpenAI',
          release: '2024-05-13',
          benchmarks: { HumanEval: { 'pass@1': 90.2, 'pass@10': 95 }, MMLU: { acc: 0.887 } }
        }
      },
      config,
      ctx
    );

    expect(record?.name).toBe('GPT-4o');
    expect(record?.categoryKey).toBe('OpenAI');
    expect(record?.readings.map((reading) => reading.key)).toEqual([
      'benchmarks.humaneval.pass@1',
      'benchmarks.humaneval.pass@10',
      'benchmarks.mmlu.acc'
    ]);
  });

  it('prefers pass@1 over a higher unpreferred metric', () => {
    const ctx = createExtractContext();
    const record = extractDocumentRecord(
      { id: 'doc', document: { name: 'M', benchmarks: { humaneval: { 'pass@10': 95, 'pass@1': 90.2 } } } },
      config,
      ctx
    );
    const coding = config.categories.find((category) => category.key === 'coding');

    expect(coding).toBeDefined();
    if (!record || !coding) {
      return;
    }
    expect(deriveCategoryScore(record.readings, coding, config.preferredMetricSuffixes)).toBeCloseTo(0.902, 10);
  });

  it('falls back to the file name and the whole document', () => {
    const ctx = createExtractContext();
    const named = extractDocumentRecord({ id: 'models/acme/widget-7b.json', document: { scores: { GSM8K: '81.0%' } } }, config, ctx);
    expect(named?.name).toBe('widget-7b');
    expect(named?.readings).toEqual([{ key: 'scores.gsm8k', value: 0.81 }]);

    const bare = extractDocumentRecord({ id: 'x.json', document: { name: 'X', humaneval: 0.5 } }, config, ctx);
    expect(bare?.readings).toEqual([{ key: 'humaneval', value: 0.5 }]);
  });

  it('drops non-object documents with a warning', () => {
    const ctx = createExtractContext();
    const { records, dropped } = extractDocumentRecords(
      [
        { id: 'bad.json', document: [1, 2] },
        { id: 'good.json', document: { name: 'Good', evals: { mmmu: 60 } } }
      ],
      config,
      ctx
    );

    expect(records.map((record) => record.name)).toEqual(['Good']);
    expect(dropped).toBe(1);
    expect(ctx.diagnostics).toEqual([
      {
        code: 'DOCUMENT_NOT_OBJECT',
        severity: 'warning',
        message: 'JSON document is not an object.',
        source: { name: 'bad.json', line: undefined }
      }
    ]);
  });
});
