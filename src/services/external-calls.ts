/**
 * External Call Guard
 *
 * The standard path for quota-limited external reads:
 *   cache lookup → (miss) rate-limit token → compute, optionally retried → cache write
 *
 * Each retry attempt takes its own token, since every attempt is a real
 * request against the remote quota.
 */

import { TransientIOError } from '../infra/errors.js';
import type { RateLimiter } from '../infra/rate-limiter.js';
import type { RetryExecutor, RetryPolicy } from '../infra/retry-executor.js';
import type { CacheSchema, CacheStore } from '../db/cache.js';

export interface GuardedCallOptions<T> {
  namespace: string;
  key: string;
  /** Rate-limit resource guarding the remote quota */
  resource: string;
  /** Entry lifetime (default: the namespace's configured TTL) */
  ttlMs?: number;
  /** Retry policy; omitted means a single attempt */
  policy?: RetryPolicy;
  /** Tokens per attempt (default: 1) */
  tokens?: number;
  /** How long one attempt may wait for tokens (default: 0, no waiting) */
  maxWaitMs?: number;
  signal?: AbortSignal;
  schema?: CacheSchema<T>;
}

export class ExternalCallGuard {
  private cache: CacheStore;
  private limiter: RateLimiter;
  private executor: RetryExecutor;

  constructor(cache: CacheStore, limiter: RateLimiter, executor: RetryExecutor) {
    this.cache = cache;
    this.limiter = limiter;
    this.executor = executor;
  }

  /**
   * Return the cached value or fetch it under the resource's rate limit
   *
   * @example
   * ```typescript
   * const weather = await guard.call(
   *   { namespace: CacheNamespaces.WEATHER, key: 'Seoul', resource: 'weather_api', policy },
   *   signal => fetchWeather('Seoul', signal)
   * );
   * ```
   */
  async call<T>(options: GuardedCallOptions<T>, compute: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    const { namespace, key, resource, policy, signal, schema } = options;
    const ttlMs = options.ttlMs ?? this.cache.ttlFor(namespace);
    const tokens = options.tokens ?? 1;
    const maxWaitMs = options.maxWaitMs ?? 0;

    const guarded = async (attemptSignal?: AbortSignal): Promise<T> => {
      const granted = await this.limiter.acquire(resource, tokens, maxWaitMs, attemptSignal);
      if (!granted) {
        throw new TransientIOError(`Rate limit for ${resource} exhausted`);
      }
      return compute(attemptSignal);
    };

    return this.cache.getOrCompute(
      namespace,
      key,
      ttlMs,
      computeSignal => {
        if (!policy) return guarded(computeSignal);
        return this.executor.execute(
          ({ signal: attemptSignal }) => guarded(attemptSignal),
          policy,
          { signal: computeSignal, label: `${resource} ${namespace}:${key}` }
        );
      },
      { signal, schema }
    );
  }
}
