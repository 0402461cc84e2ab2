/**
 * Resilient Fetch Utility
 *
 * JSON fetch on top of the RetryExecutor:
 * - Per-attempt timeout via AbortController
 * - Status codes classified into TransientIOError / PermanentRequestError
 * - 429 Retry-After parsing (seconds or HTTP-date)
 */

import { CancelledError, TransientIOError, errorForStatus, toError } from './errors.js';
import { RetryExecutor, createRetryPolicy, type RetryPolicy } from './retry-executor.js';

export interface ResilientFetchOptions {
  /** Retry policy (default: 3 attempts, 300ms base, 30s cap, 10% jitter) */
  policy?: RetryPolicy;
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const executor = new RetryExecutor();

/**
 * Network-level failure messages that should be retried
 */
const NETWORK_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'fetch failed',
  'network error',
];

/**
 * Determines if an error is a network-level error that should be retried
 */
export function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();
  const code = errorCode(error)?.toLowerCase();

  return NETWORK_ERROR_PATTERNS.some(pattern => {
    const p = pattern.toLowerCase();
    return message.includes(p) || name.includes(p) || code === p;
  });
}

function errorCode(error: Error): string | undefined {
  const cause = error.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Parses a Retry-After header value
 * @returns Delay in milliseconds, or null if the value is not parseable
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) return null;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date)) {
    const delayMs = date - now;
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
}

/**
 * Link an outer cancellation signal with a per-attempt timeout
 */
function attemptSignal(timeoutMs: number, outer?: AbortSignal) {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onOuterAbort = () => controller.abort(outer?.reason);
  outer?.addEventListener('abort', onOuterAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
    },
  };
}

/**
 * Performs an HTTP fetch with retries, exponential backoff, jitter and
 * per-attempt timeouts.
 *
 * @returns Parsed JSON response of type T
 * @throws RetriesExhaustedError when transient failures persist
 * @throws PermanentRequestError on non-retryable statuses (4xx)
 * @throws CancelledError when the caller's signal fires
 *
 * @example
 * ```typescript
 * const forecast = await resilientFetch<Forecast>(
 *   'https://api.example.com/forecast?city=Seoul',
 *   { headers: { Accept: 'application/json' } },
 *   { timeoutMs: 5000 }
 * );
 * ```
 */
export async function resilientFetch<T>(
  url: string,
  init: RequestInit = {},
  options: ResilientFetchOptions = {}
): Promise<T> {
  const policy = options.policy ?? createRetryPolicy();
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return executor.execute<T>(
    async ({ signal }) => {
      const attempt = attemptSignal(timeoutMs, signal);
      try {
        const response = await fetch(url, { ...init, signal: attempt.signal });

        if (response.ok) {
          return (await response.json()) as T;
        }

        const retryAfterMs =
          response.status === 429
            ? parseRetryAfter(response.headers.get('Retry-After')) ?? undefined
            : undefined;

        throw errorForStatus(
          response.status,
          `HTTP ${response.status}: ${response.statusText} (${url})`,
          { retryAfterMs }
        );
      } catch (error) {
        const err = toError(error);
        if (signal?.aborted) {
          throw new CancelledError(`Request to ${url} cancelled`, err);
        }
        if (attempt.timedOut()) {
          throw new TransientIOError(`Request timed out after ${timeoutMs}ms (${url})`, { cause: err });
        }
        if (isNetworkError(err)) {
          throw new TransientIOError(err.message, { cause: err });
        }
        throw err;
      } finally {
        attempt.dispose();
      }
    },
    policy,
    { signal: options.signal, label: `${init.method ?? 'GET'} ${url}` }
  );
}
