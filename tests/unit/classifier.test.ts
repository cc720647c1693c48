import { beforeAll, describe, expect, it } from 'vitest';

import { loadDefaultConfig } from '../../src/config/config-loader.js';
import { classify, compileProviderClassifier, escapeRegExp, type ProviderClassifier } from '../../src/pipeline/classifier.js';

describe('provider classifier', () => {
  let classifier: ProviderClassifier;

  beforeAll(async () => {
    classifier = compileProviderClassifier(await loadDefaultConfig());
  });

  it('matches keywords as whole tokens', () => {
    expect(classify('GPT-4o', undefined, classifier)).toBe('OpenAI');
    expect(classify('o1-preview', undefined, classifier)).toBe('OpenAI');
    expect(classify('Claude 3.5 Sonnet', undefined, classifier)).toBe('Anthropic');
    expect(classify('Gemini 2.0 Flash', undefined, classifier)).toBe('Google');
    expect(classify('DeepSeek-V3', undefined, classifier)).toBe('DeepSeek');
    expect(classify('Qwen 2.5 72B', undefined, classifier)).toBe('Alibaba/Qwen');
    expect(classify('Command R+', undefined, classifier)).toBe('Cohere');
  });

  it('does not match keywords inside longer tokens', () => {
    expect(classify('Pro1 Ultra', undefined, classifier)).toBe('Other');
    expect(classify('Megpt', undefined, classifier)).toBe('Other');
  });

  it('resolves overlaps by precedence order', () => {
    expect(classify('gpt claude merge', undefined, classifier)).toBe('OpenAI');
  });

  it('prefers a non-blank explicit provider', () => {
    expect(classify('Claude', ' Acme Labs ', classifier)).toBe('Acme Labs');
    expect(classify('Claude', '   ', classifier)).toBe('Anthropic');
  });

  it('falls back for unknown names', () => {
    expect(classify('Unknown Model', undefined, classifier)).toBe('Other');
  });

  it('escapes keyword metacharacters', () => {
    const custom = compileProviderClassifier({
      providers: [{ label: 'Plus', keywords: ['c++'] }],
      fallbackProvider: 'None'
    });
    expect(escapeRegExp('c++')).toBe('c\\+\\+');
    expect(classify('c++ coder', undefined, custom)).toBe('Plus');
    expect(classify('cxx coder', undefined, custom)).toBe('None');
  });
});
