/**
 * Cache Store
 *
 * Namespaced, TTL-bound memoization of external calls over the shared
 * KeyValueStore. Namespaces nest with ':' ('garmin:health' sits under 'garmin'). Entries are JSON envelopes `{ value, expiresAt }`; the
 * backing store expires them too, so stale keys do not accumulate.
 *
 * Concurrent misses on the same key may both compute. The first write wins
 * and every caller receives the value it computed itself.
 */

import { z } from 'zod';
import { throwIfAborted, raceAbort } from '../infra/abort.js';
import { CancelledError, ConfigurationError, toError } from '../infra/errors.js';
import { FALLBACK_CACHE_TTL_MS } from '../config/limits.js';
import { escapeGlob, type KeyValueStore } from './store.js';

const envelopeSchema = z.object({
  value: z.unknown(),
  expiresAt: z.number(),
});

export interface CacheEntry<T> {
  key: string;
  value: T;
  expiresAt: number;
}

export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface GetOrComputeOptions<T> {
  signal?: AbortSignal;
  /** Validates cached values; a hit that fails validation is recomputed */
  schema?: CacheSchema<T>;
}

export type ComputeFn<T> = (signal?: AbortSignal) => Promise<T>;

export interface CacheStoreOptions {
  /** Key prefix shared by every namespace (default: 'cache') */
  prefix?: string;
  /** Per-namespace default TTLs in milliseconds */
  ttls?: Readonly<Record<string, number>>;
}

/**
 * Build a key from call arguments: objects contribute sorted key=value pairs
 *
 * @example
 * cacheKeyFromArgs('Seoul', { units: 'metric', lang: 'ko' }) // 'Seoul:lang=ko:units=metric'
 */
export function cacheKeyFromArgs(...parts: Array<string | number | boolean | Record<string, unknown>>): string {
  return parts
    .map(part => {
      if (typeof part === 'object') {
        return Object.keys(part)
          .sort()
          .map(k => `${k}=${String(part[k])}`)
          .join(':');
      }
      return String(part);
    })
    .filter(Boolean)
    .join(':');
}

export class CacheStore {
  private store: KeyValueStore;
  private prefix: string;
  private ttls: Readonly<Record<string, number>>;

  constructor(store: KeyValueStore, options: CacheStoreOptions = {}) {
    this.store = store;
    this.prefix = options.prefix ?? 'cache';
    this.ttls = options.ttls ?? {};
  }

  /**
   * `prefix:namespace:key` with the key percent-encoded, so a ':' inside a
   * key never reads as a nested namespace boundary
   */
  private storageKey(namespace: string, key: string): string {
    return `${this.prefix}:${namespace}:${encodeURIComponent(key)}`;
  }

  /**
   * Configured TTL for a namespace
   */
  ttlFor(namespace: string): number {
    return this.ttls[namespace] ?? FALLBACK_CACHE_TTL_MS;
  }

  /**
   * Decode a raw stored value. Expired or malformed envelopes are misses.
   */
  private decode<T>(raw: string | null, schema?: CacheSchema<T>): { value: T; expiresAt: number } | null {
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success || Date.now() >= envelope.data.expiresAt) {
      return null;
    }
    const { expiresAt } = envelope.data;

    if (schema) {
      const checked = schema.safeParse(envelope.data.value);
      return checked.success ? { value: checked.data, expiresAt } : null;
    }
    return { value: envelope.data.value as T, expiresAt };
  }

  /**
   * Read a live entry without computing
   */
  async peek<T>(namespace: string, key: string, schema?: CacheSchema<T>): Promise<CacheEntry<T> | null> {
    const storageKey = this.storageKey(namespace, key);
    const hit = this.decode(await this.store.get(storageKey), schema);
    return hit ? { key: storageKey, ...hit } : null;
  }

  /**
   * Return the cached value for namespace:key, or compute, store and return it
   *
   * - A hit never invokes compute
   * - A failed or cancelled compute writes nothing
   * - Backing-store failures propagate (no silent "uncached" mode)
   *
   * @param ttlMs - Lifetime of a freshly computed entry (> 0)
   */
  async getOrCompute<T>(
    namespace: string,
    key: string,
    ttlMs: number,
    compute: ComputeFn<T>,
    options: GetOrComputeOptions<T> = {}
  ): Promise<T> {
    if (!(ttlMs > 0)) {
      throw new ConfigurationError(`Cache TTL must be > 0 (got ${ttlMs})`);
    }
    const { signal, schema } = options;
    throwIfAborted(signal);

    const storageKey = this.storageKey(namespace, key);
    const observed = await this.store.get(storageKey);
    const hit = this.decode(observed, schema);
    if (hit) {
      return hit.value;
    }

    const value = await raceAbort(compute(signal), signal);

    if (signal?.aborted) {
      throw new CancelledError(`Cache fill for ${storageKey} cancelled`);
    }

    const serialized = JSON.stringify({ value, expiresAt: Date.now() + ttlMs });
    // A false result means another writer filled the key since our read; theirs stays
    await this.store.compareAndSet(storageKey, observed, serialized, ttlMs);
    return value;
  }

  /**
   * getOrCompute with the namespace's configured TTL
   */
  async remember<T>(
    namespace: string,
    key: string,
    compute: ComputeFn<T>,
    options: GetOrComputeOptions<T> = {}
  ): Promise<T> {
    return this.getOrCompute(namespace, key, this.ttlFor(namespace), compute, options);
  }

  /**
   * Remove one entry immediately
   */
  async invalidate(namespace: string, key: string): Promise<boolean> {
    const removed = await this.store.del(this.storageKey(namespace, key));
    return removed > 0;
  }

  /**
   * Remove every entry under a namespace, nested namespaces included
   * ('garmin' also clears 'garmin:health')
   *
   * @returns Number of entries removed
   */
  async invalidateNamespace(namespace: string): Promise<number> {
    const keys = await this.store.keys(`${escapeGlob(this.prefix)}:${escapeGlob(namespace)}:*`);
    if (keys.length === 0) return 0;

    try {
      return await this.store.del(...keys);
    } catch (error) {
      console.error(`[Cache] Failed to invalidate namespace ${namespace}: ${toError(error).message}`);
      throw error;
    }
  }
}
