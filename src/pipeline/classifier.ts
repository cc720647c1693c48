import type { PipelineConfig } from '../config/types.js';

/** One provider label with its compiled whole-word matcher. */
export interface ProviderMatcher {
  label: string;
  pattern: RegExp;
}

/** Compiled classifier state for one run. */
export interface ProviderClassifier {
  matchers: ProviderMatcher[];
  fallback: string;
}

/** Escape a literal keyword for use inside a regular expression. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile the provider precedence list. Keywords are matched as whole tokens,
 * case-insensitively; letters and digits on either side break a match, so
 * `o1` never matches inside `pro1` and `gpt` matches `GPT-4o`.
 */
export function compileProviderClassifier(config: Pick<PipelineConfig, 'providers' | 'fallbackProvider'>): ProviderClassifier {
  const matchers = config.providers
    .filter((provider) => provider.keywords.length > 0)
    .map((provider) => ({
      label: provider.label,
      pattern: new RegExp(
        `(?<![\\p{L}\\p{N}])(?:${provider.keywords.map(escapeRegExp).join('|')})(?![\\p{L}\\p{N}])`,
        'iu'
      )
    }));

  return { matchers, fallback: config.fallbackProvider };
}

/**
 * Resolve the provider label for an entity. A non-blank explicit value wins
 * verbatim (trimmed); otherwise the earliest label in precedence order with a
 * matching keyword, otherwise the fallback label.
 */
export function classify(name: string, explicitCategory: string | undefined, classifier: ProviderClassifier): string {
  const explicit = explicitCategory?.trim();
  if (explicit) {
    return explicit;
  }

  for (const matcher of classifier.matchers) {
    if (matcher.pattern.test(name)) {
      return matcher.label;
    }
  }

  return classifier.fallback;
}
