import path from 'node:path';
import { describe, expect, it } from 'vitest';

import {
  DeliveryError,
  generateDigest,
  loadDefaultConfig,
  MemorySink,
  MemorySnapshotStore,
  readFileSource,
  readSectionOrder,
  type ReportSink,
  type SourceInput
} from '../../src/public/api.js';

const README = path.resolve('fixtures/leaderboard/README.md');

/** Sink that always rejects. */
class FailingSink implements ReportSink {
  async deliver(): Promise<void> {
    throw new DeliveryError('Telegram delivery failed after 2 attempts: offline', 2);
  }
}

describe('public api', () => {
  it('generates, delivers and stores a digest', async () => {
    const config = await loadDefaultConfig();
    const source = await readFileSource(README, 'markdown', config);
    const store = new MemorySnapshotStore();
    const sink = new MemorySink();

    const first = await generateDigest(source, { config, store, sink });
    expect(first.outcome.status).toBe('ok');
    expect(first.delivered).toBe(1);
    expect(readSectionOrder(sink.messages[0] ?? '').slice(0, 4)).toEqual(['Coding', 'Math', 'Knowledge', 'Multimodal']);

    const saved = await store.load();
    expect(saved['leaders/knowledge']?.[0]).toEqual({ name: 'o1-preview', score: 78 });

    await generateDigest(source, { config, store, sink });
    expect(sink.messages[1]?.split('\n')).toContain('  1. o1-preview: 78.0% =');
  });

  it('applies overrides when it loads the configuration itself', async () => {
    const config = await loadDefaultConfig();
    const source = await readFileSource(README, 'markdown', config);
    const sink = new MemorySink();

    const result = await generateDigest(source, { overrides: { excludePattern: { source: '.', flags: 'i' } }, sink });

    expect(result.outcome.status).toBe('all-filtered');
    expect(sink.messages).toEqual(['⚠️ Every model was removed by the exclusion pattern; check EXCLUDE_REGEX.']);
  });

  it('keeps the stored snapshot when delivery fails', async () => {
    const source: SourceInput = {
      kind: 'markdown',
      sourceName: 'inline',
      text: '| Model | HumanEval |\n|---|---|\n| Alpha | 80 |\n'
    };
    const store = new MemorySnapshotStore({ 'leaders/coding': [{ name: 'Beta', score: 70 }] });

    await expect(generateDigest(source, { store, sink: new FailingSink() })).rejects.toThrow(DeliveryError);
    expect(await store.load()).toEqual({ 'leaders/coding': [{ name: 'Beta', score: 70 }] });
  });
});
