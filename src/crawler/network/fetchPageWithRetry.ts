import { getLogger } from '../../logger.js';
import type { FetchResult, RetryPolicy, Sleeper } from '../../types.js';
import { reportCorpusError } from '../../util/errorHandler.js';
import { fetchPage, type FetchLike } from './fetchPage.js';

export interface FetchWithRetryOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  userAgent?: string;
  fetchImpl?: FetchLike;
  sleep?: Sleeper;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialBackoffMs: 1_000,
  backoffFactor: 1.5,
};

export const EXHAUSTED: FetchResult = Object.freeze({ status: null, body: null, raw: null });

/**
 * Retries transport faults only. Any HTTP response, whatever its status, ends
 * the loop and is handed back with its bytes and decoded body. When every
 * attempt fails the all-null result is returned instead of an error.
 */
export async function fetchPageWithRetry(
  url: string,
  options: FetchWithRetryOptions,
): Promise<FetchResult> {
  const { maxAttempts, initialBackoffMs, backoffFactor } = options.retry;
  const sleep = options.sleep ?? delay;
  const logger = getLogger();
  let wait = initialBackoffMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const page = await fetchPage(url, {
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
        fetchImpl: options.fetchImpl,
      });
      return { status: page.status, body: page.body, raw: page.raw };
    } catch (error) {
      reportCorpusError(
        error,
        { url, attempt },
        { defaultKind: 'fetch', defaultSeverity: 'recoverable', recoverableLevel: 'debug' },
      );

      if (attempt === maxAttempts) {
        break;
      }

      await sleep(wait);
      wait *= backoffFactor;
    }
  }

  logger.warn({ url, attempts: maxAttempts }, 'giving up after transport failures');
  return EXHAUSTED;
}

export function createFetcher(options: FetchWithRetryOptions): (url: string) => Promise<FetchResult> {
  return (url) => fetchPageWithRetry(url, options);
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
