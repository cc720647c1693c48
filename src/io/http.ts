import { fetch, type Dispatcher, type Response } from 'undici';

import { SourceFetchError } from '../core/errors.js';

/** Statuses retried with backoff. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** Shared options for HTTP collaborators. */
export interface HttpOptions {
  /** Undici dispatcher; tests pass a `MockAgent`. */
  dispatcher?: Dispatcher;
  /** Total attempts, including the first. */
  retries?: number;
  /** Base backoff delay; attempt `n` waits `baseDelayMs * 2^n`. */
  baseDelayMs?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Sleep override, mainly for tests. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRIES = 4;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_TIMEOUT_MS = 30_000;

/** Resolve after `ms` milliseconds. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET `url`, retrying transient failures: 429, 5xx gateway errors, a 403
 * whose body mentions a rate limit, and network errors. Other non-2xx
 * statuses fail at once. Throws `SourceFetchError` once attempts run out.
 */
export async function fetchWithRetry(url: string, options: HttpOptions = {}): Promise<Response> {
  const attempts = Math.max(1, options.retries ?? DEFAULT_RETRIES);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const sleep = options.sleep ?? delay;
  let lastMessage = 'no attempt made';
  let lastStatus: number | undefined;

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (attempt > 0) {
      await sleep(baseDelayMs * 2 ** (attempt - 1));
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers: options.headers,
        dispatcher: options.dispatcher,
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
      });
    } catch (error) {
      lastMessage = error instanceof Error ? error.message : String(error);
      lastStatus = undefined;
      continue;
    }

    if (response.ok) {
      return response;
    }

    lastStatus = response.status;
    const body = await response.text();
    lastMessage = `HTTP ${response.status} for ${url}`;
    if (!isRetryable(response.status, body)) {
      throw new SourceFetchError(url, lastMessage, response.status);
    }
  }

  throw new SourceFetchError(url, `${lastMessage} after ${attempts} attempt(s)`, lastStatus);
}

/** True for statuses worth another attempt. */
export function isRetryable(status: number, body: string): boolean {
  if (RETRYABLE_STATUSES.has(status)) {
    return true;
  }
  return status === 403 && /rate limit/i.test(body);
}

/** Fetch `url` and return its body as text. */
export async function fetchText(url: string, options: HttpOptions = {}): Promise<string> {
  const response = await fetchWithRetry(url, options);
  return response.text();
}

/** Fetch `url` and parse its body as JSON. */
export async function fetchJson(url: string, options: HttpOptions = {}): Promise<unknown> {
  const text = await fetchText(url, options);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceFetchError(url, `Invalid JSON from ${url}: ${message}`);
  }
}
