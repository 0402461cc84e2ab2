/**
 * Token Bucket Rate Limiter
 *
 * Admission control per named resource (one per external quota). Bucket
 * state lives in the shared KeyValueStore so every worker process draws from
 * the same bucket; this class holds no mutable state of its own.
 *
 * Each admission reads the bucket, refills it lazily
 * (tokens + elapsed * refillPerSecond, capped at capacity) and writes the
 * decremented state back with compareAndSet. A lost race re-reads and
 * tries again, so two callers can never both spend the same token.
 */

import { z } from 'zod';
import { delay, throwIfAborted } from './abort.js';
import {
  CancelledError,
  ConfigurationError,
  LimiterUnavailableError,
  toError,
} from './errors.js';
import type { BucketConfig } from '../config/limits.js';
import type { KeyValueStore } from '../db/store.js';

/**
 * Persisted bucket state
 */
export interface BucketState {
  /** Tokens available at updatedAt, within [0, capacity] */
  tokens: number;
  /** Last refill timestamp (ms since epoch) */
  updatedAt: number;
}

/**
 * Point-in-time view of a bucket
 */
export interface BucketSnapshot {
  resource: string;
  tokens: number;
  capacity: number;
  /** Time until one token is available (0 if available now) */
  waitMs: number;
}

export interface RateLimiterOptions {
  /** Key prefix for bucket state (default: 'ratelimit') */
  prefix?: string;
  /** compareAndSet rounds before giving up under contention (default: 16) */
  maxContentionRounds?: number;
}

interface AttemptResult {
  granted: boolean;
  tokens: number;
  /** Time until the requested tokens could be available */
  waitMs: number;
}

const bucketStateSchema = z.object({
  tokens: z.number().finite().min(0),
  updatedAt: z.number().finite(),
});

/**
 * Keep state keys a little past the moment the bucket is full again
 */
const STATE_EXPIRY_MARGIN_MS = 1000;

/**
 * Apply lazy refill to a stored state. Missing state is a full bucket.
 */
export function refillBucket(state: BucketState | null, config: BucketConfig, now: number): BucketState {
  if (!state) {
    return { tokens: config.capacity, updatedAt: now };
  }
  const elapsedSeconds = Math.max(0, now - state.updatedAt) / 1000;
  const tokens = Math.min(config.capacity, state.tokens + elapsedSeconds * config.refillPerSecond);
  return { tokens: Math.max(0, tokens), updatedAt: now };
}

/**
 * Shared token buckets
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter(store, { github_api: { capacity: 30, refillPerSecond: 0.5 } });
 *
 * if (await limiter.tryAcquire('github_api')) {
 *   await fetchEvents();
 * }
 *
 * // Or wait up to 5 seconds for a token
 * const granted = await limiter.acquire('github_api', 1, 5000, signal);
 * ```
 */
export class RateLimiter {
  private store: KeyValueStore;
  private limits: Readonly<Record<string, BucketConfig>>;
  private prefix: string;
  private maxContentionRounds: number;

  constructor(
    store: KeyValueStore,
    limits: Readonly<Record<string, BucketConfig>>,
    options: RateLimiterOptions = {}
  ) {
    this.store = store;
    this.limits = limits;
    this.prefix = options.prefix ?? 'ratelimit';
    this.maxContentionRounds = options.maxContentionRounds ?? 16;
  }

  private bucketConfig(resource: string): BucketConfig {
    const config = this.limits[resource];
    if (!config) {
      throw new ConfigurationError(`No rate limit configured for resource "${resource}"`);
    }
    return config;
  }

  private key(resource: string): string {
    return `${this.prefix}:${resource}`;
  }

  hasResource(resource: string): boolean {
    return resource in this.limits;
  }

  /**
   * Decode persisted state. Undecodable state reads as an empty bucket at
   * `now` (fails closed) and is flagged so the caller can overwrite it.
   */
  private parseState(
    resource: string,
    raw: string | null,
    now: number
  ): { state: BucketState | null; corrupt: boolean } {
    if (raw === null) return { state: null, corrupt: false };

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      decoded = undefined;
    }
    const parsed = bucketStateSchema.safeParse(decoded);
    if (parsed.success) {
      return { state: parsed.data, corrupt: false };
    }

    console.warn(`[RateLimiter] ${resource}: undecodable bucket state, treating as empty`);
    return { state: { tokens: 0, updatedAt: now }, corrupt: true };
  }

  private async writeState(
    resource: string,
    expected: string | null,
    next: BucketState,
    config: BucketConfig
  ): Promise<boolean> {
    const ttlMs =
      Math.ceil(((config.capacity - next.tokens) / config.refillPerSecond) * 1000) + STATE_EXPIRY_MARGIN_MS;
    try {
      return await this.store.compareAndSet(this.key(resource), expected, JSON.stringify(next), ttlMs);
    } catch (error) {
      throw new LimiterUnavailableError(
        resource,
        `Rate limiter update for ${resource} failed: ${toError(error).message}`,
        error
      );
    }
  }

  private async readRaw(resource: string): Promise<string | null> {
    try {
      return await this.store.get(this.key(resource));
    } catch (error) {
      throw new LimiterUnavailableError(
        resource,
        `Rate limiter state for ${resource} unavailable: ${toError(error).message}`,
        error
      );
    }
  }

  private async attempt(resource: string, requested: number): Promise<AttemptResult> {
    const config = this.bucketConfig(resource);

    for (let round = 0; round < this.maxContentionRounds; round++) {
      const raw = await this.readRaw(resource);
      const now = Date.now();
      const { state: stored, corrupt } = this.parseState(resource, raw, now);
      const state = refillBucket(stored, config, now);

      if (state.tokens < requested) {
        if (corrupt) {
          // Replace the bad value so refill runs from now; losing this race is fine
          await this.writeState(resource, raw, state, config);
        }
        return {
          granted: false,
          tokens: state.tokens,
          waitMs: ((requested - state.tokens) / config.refillPerSecond) * 1000,
        };
      }

      const next: BucketState = { tokens: state.tokens - requested, updatedAt: now };
      if (await this.writeState(resource, raw, next, config)) {
        return { granted: true, tokens: next.tokens, waitMs: 0 };
      }
    }

    throw new LimiterUnavailableError(
      resource,
      `Rate limiter for ${resource} gave up after ${this.maxContentionRounds} contended updates`
    );
  }

  private validateRequest(resource: string, tokens: number): boolean {
    if (!(tokens > 0) || !Number.isFinite(tokens)) {
      throw new ConfigurationError(`Requested tokens must be a positive number (got ${tokens})`);
    }
    const { capacity } = this.bucketConfig(resource);
    if (tokens > capacity) {
      console.warn(
        `[RateLimiter] ${resource}: ${tokens} tokens requested exceeds capacity ${capacity}; never grantable`
      );
      return false;
    }
    return true;
  }

  /**
   * Take tokens if available right now
   *
   * @throws LimiterUnavailableError if the shared store is unreachable (fails closed)
   */
  async tryAcquire(resource: string, tokens: number = 1): Promise<boolean> {
    if (!this.validateRequest(resource, tokens)) return false;
    const result = await this.attempt(resource, tokens);
    return result.granted;
  }

  /**
   * Take tokens, suspending until they are available or maxWaitMs elapses
   *
   * Returns false without sleeping when the bucket cannot refill enough
   * before the deadline. Cancellation never spends tokens.
   *
   * @throws CancelledError when the signal fires while waiting
   * @throws LimiterUnavailableError if the shared store is unreachable
   */
  async acquire(
    resource: string,
    tokens: number = 1,
    maxWaitMs: number = 0,
    signal?: AbortSignal
  ): Promise<boolean> {
    if (!this.validateRequest(resource, tokens)) return false;
    const deadline = Date.now() + Math.max(0, maxWaitMs);

    for (;;) {
      throwIfAborted(signal);

      const result = await this.attempt(resource, tokens);
      if (result.granted) {
        return true;
      }

      const remaining = deadline - Date.now();
      const waitMs = Math.ceil(result.waitMs);
      if (remaining <= 0 || waitMs > remaining) {
        return false;
      }

      try {
        await delay(waitMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw new CancelledError(`Waiting for ${resource} rate limit cancelled`, error);
        }
        throw error;
      }
    }
  }

  /**
   * Current state of a bucket, without consuming anything
   */
  async inspect(resource: string): Promise<BucketSnapshot> {
    const config = this.bucketConfig(resource);
    const now = Date.now();
    const { state: stored } = this.parseState(resource, await this.readRaw(resource), now);
    const state = refillBucket(stored, config, now);

    return {
      resource,
      tokens: state.tokens,
      capacity: config.capacity,
      waitMs: state.tokens >= 1 ? 0 : Math.ceil(((1 - state.tokens) / config.refillPerSecond) * 1000),
    };
  }

  /**
   * Reset a bucket to full (manual override)
   */
  async reset(resource: string): Promise<void> {
    this.bucketConfig(resource);
    try {
      await this.store.del(this.key(resource));
    } catch (error) {
      throw new LimiterUnavailableError(resource, `Rate limiter reset failed: ${toError(error).message}`, error);
    }
    console.log(`[RateLimiter] Reset bucket for ${resource}`);
  }

  /**
   * Get a summary of every configured bucket
   */
  async getSummary(): Promise<{
    total: number;
    exhausted: number;
    buckets: BucketSnapshot[];
  }> {
    const buckets = await Promise.all(Object.keys(this.limits).map(r => this.inspect(r)));
    return {
      total: buckets.length,
      exhausted: buckets.filter(b => b.tokens < 1).length,
      buckets,
    };
  }
}
