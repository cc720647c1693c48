import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SourceFetchError } from '../../src/core/errors.js';
import { fetchJson, fetchText, fetchWithRetry, isRetryable } from '../../src/io/http.js';

const ORIGIN = 'https://data.example.test';

describe('http fetch with retry', () => {
  let agent: MockAgent;
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    delays.length = 0;
  });

  afterEach(async () => {
    await agent.close();
  });

  it('classifies retryable statuses', () => {
    expect(isRetryable(429, '')).toBe(true);
    expect(isRetryable(502, '')).toBe(true);
    expect(isRetryable(403, 'API rate limit exceeded')).toBe(true);
    expect(isRetryable(403, 'forbidden')).toBe(false);
    expect(isRetryable(404, '')).toBe(false);
  });

  it('retries transient failures with exponential backoff', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/readme.md', method: 'GET' }).reply(503, 'busy');
    pool.intercept({ path: '/readme.md', method: 'GET' }).reply(403, 'API rate limit exceeded');
    pool.intercept({ path: '/readme.md', method: 'GET' }).reply(200, '# ok');

    const text = await fetchText(`${ORIGIN}/readme.md`, { dispatcher: agent, baseDelayMs: 10, sleep });

    expect(text).toBe('# ok');
    expect(delays).toEqual([10, 20]);
    agent.assertNoPendingInterceptors();
  });

  it('fails at once on a non-retryable status', async () => {
    agent.get(ORIGIN).intercept({ path: '/missing', method: 'GET' }).reply(404, 'nope');

    const failure = fetchWithRetry(`${ORIGIN}/missing`, { dispatcher: agent, sleep });
    await expect(failure).rejects.toBeInstanceOf(SourceFetchError);
    await expect(failure).rejects.toMatchObject({ status: 404, location: `${ORIGIN}/missing` });
    expect(delays).toEqual([]);
  });

  it('gives up after the configured attempts', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/flaky', method: 'GET' }).reply(500, 'err').times(2);

    await expect(fetchWithRetry(`${ORIGIN}/flaky`, { dispatcher: agent, retries: 2, baseDelayMs: 1, sleep })).rejects.toThrow(
      `HTTP 500 for ${ORIGIN}/flaky after 2 attempt(s)`
    );
  });

  it('parses JSON bodies', async () => {
    agent.get(ORIGIN).intercept({ path: '/doc.json', method: 'GET' }).reply(200, { name: 'GPT-4o' });
    expect(await fetchJson(`${ORIGIN}/doc.json`, { dispatcher: agent, sleep })).toEqual({ name: 'GPT-4o' });
  });

  it('reports invalid JSON as a fetch error', async () => {
    agent.get(ORIGIN).intercept({ path: '/bad.json', method: 'GET' }).reply(200, '{ nope');
    await expect(fetchJson(`${ORIGIN}/bad.json`, { dispatcher: agent, sleep })).rejects.toBeInstanceOf(SourceFetchError);
  });
});
