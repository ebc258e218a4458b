/**
 * Retry Helpers
 * Exponential backoff with jitter, Retry-After parsing and abortable sleep
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

/** Upper bound for a server-supplied Retry-After */
export const MAX_RETRY_AFTER_MS = 60 * 1000;

export type RetryReason = 'unauthorized' | 'rate_limited' | 'server_error' | 'network';

/**
 * Calculate backoff delay with jitter
 * @param attempt The attempt that just failed (1-based)
 * @returns Delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random
): number {
  if (config.baseDelayMs === 0) {
    return 0;
  }

  const normalizedAttempt = Math.max(1, attempt);
  const exponentialDelay = config.baseDelayMs * Math.pow(2, normalizedAttempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // up to 10% jitter on top
  return cappedDelay + random() * cappedDelay * 0.1;
}

/**
 * Retry-After as delta-seconds or an HTTP date, capped at MAX_RETRY_AFTER_MS
 * @returns Delay in milliseconds, or undefined when absent or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.min(Number(trimmed) * 1000, MAX_RETRY_AFTER_MS);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.min(Math.max(0, date - now), MAX_RETRY_AFTER_MS);
}

/**
 * 5xx only; 429 and 401 have their own handling
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 && status <= 599;
}

/**
 * Sleep that rejects with the signal's reason when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
