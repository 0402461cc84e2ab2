/**
 * Cache Store Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { CacheStore, cacheKeyFromArgs } from '../db/cache.js';
import { MemoryStore } from '../db/store.js';
import { CancelledError, ConfigurationError, StoreUnavailableError } from '../infra/errors.js';
import { CacheNamespaces, FALLBACK_CACHE_TTL_MS } from '../config/limits.js';
import { UnreachableStore, flushPromises } from './fixtures/stores.fixtures.js';

interface Forecast {
  city: string;
  tempC: number;
}

describe('CacheStore', () => {
  let store: MemoryStore;
  let cache: CacheStore;

  beforeEach(() => {
    store = new MemoryStore();
    cache = new CacheStore(store, { ttls: { [CacheNamespaces.WEATHER]: 30 * 60_000 } });
  });

  afterEach(async () => {
    await store.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('getOrCompute', () => {
    it('should compute on a miss and serve the stored value on a hit', async () => {
      const compute = vi.fn(async (): Promise<Forecast> => ({ city: 'Seoul', tempC: 21 }));

      const first = await cache.getOrCompute('weather', 'Seoul', 60_000, compute);
      const second = await cache.getOrCompute('weather', 'Seoul', 60_000, compute);

      expect(first).toEqual({ city: 'Seoul', tempC: 21 });
      expect(second).toEqual(first);
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should store entries under prefix:namespace:key with the key encoded', async () => {
      await cache.getOrCompute('github', 'events:octo', 60_000, async () => [1, 2, 3]);
      expect(await store.keys('*')).toEqual(['cache:github:events%3Aocto']);
    });

    it('should keep a colon in a key from reaching into a nested namespace', async () => {
      await cache.getOrCompute('garmin:health', 'sleep', 60_000, async () => 'health-sleep');
      const compute = vi.fn(async () => 'profile');

      expect(await cache.getOrCompute('garmin', 'health:sleep', 60_000, compute)).toBe('profile');
      expect(compute).toHaveBeenCalledTimes(1);
      expect(await cache.getOrCompute('garmin:health', 'sleep', 60_000, compute)).toBe('health-sleep');
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should recompute once the TTL has elapsed', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T08:00:00Z'));
      let version = 0;
      const compute = vi.fn(async () => ++version);

      expect(await cache.getOrCompute('weather', 'Busan', 1000, compute)).toBe(1);

      vi.setSystemTime(Date.now() + 999);
      expect(await cache.getOrCompute('weather', 'Busan', 1000, compute)).toBe(1);

      vi.setSystemTime(Date.now() + 1);
      expect(await cache.getOrCompute('weather', 'Busan', 1000, compute)).toBe(2);
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it('should write nothing when compute fails', async () => {
      await expect(
        cache.getOrCompute('weather', 'Seoul', 60_000, async () => {
          throw new Error('upstream 500');
        })
      ).rejects.toThrow('upstream 500');

      expect(await cache.peek('weather', 'Seoul')).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('should cache falsy values', async () => {
      const compute = vi.fn(async () => 0);
      await cache.getOrCompute('calendar', 'free-slots', 60_000, compute);
      expect(await cache.getOrCompute('calendar', 'free-slots', 60_000, compute)).toBe(0);
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should reject a non-positive TTL', async () => {
      await expect(cache.getOrCompute('weather', 'Seoul', 0, async () => 1)).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });

    it('should treat a malformed stored value as a miss', async () => {
      await store.set('cache:weather:Seoul', 'not json');
      expect(await cache.getOrCompute('weather', 'Seoul', 60_000, async () => 'fresh')).toBe('fresh');
      expect((await cache.peek('weather', 'Seoul'))?.value).toBe('fresh');
    });

    it('should recompute when a cached value fails the schema', async () => {
      const schema = z.object({ city: z.string(), tempC: z.number() });
      await store.set(
        'cache:weather:Seoul',
        JSON.stringify({ value: { city: 'Seoul', tempC: 'warm' }, expiresAt: Date.now() + 60_000 })
      );

      const value = await cache.getOrCompute('weather', 'Seoul', 60_000, async () => ({ city: 'Seoul', tempC: 18 }), {
        schema,
      });

      expect(value).toEqual({ city: 'Seoul', tempC: 18 });
      expect((await cache.peek('weather', 'Seoul', schema))?.value).toEqual({ city: 'Seoul', tempC: 18 });
    });

    it('should propagate backing store failures without computing', async () => {
      const broken = new CacheStore(new UnreachableStore());
      const compute = vi.fn(async () => 'value');

      await expect(broken.getOrCompute('weather', 'Seoul', 60_000, compute)).rejects.toBeInstanceOf(
        StoreUnavailableError
      );
      expect(compute).not.toHaveBeenCalled();
    });
  });

  describe('Concurrent misses', () => {
    it('should keep the first write and return each caller its own value', async () => {
      let resolveFirst: (value: string) => void = () => {};
      let resolveSecond: (value: string) => void = () => {};
      const first = vi.fn(() => new Promise<string>(resolve => (resolveFirst = resolve)));
      const second = vi.fn(() => new Promise<string>(resolve => (resolveSecond = resolve)));

      const p1 = cache.getOrCompute('github', 'repo', 60_000, first);
      const p2 = cache.getOrCompute('github', 'repo', 60_000, second);
      await flushPromises();
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledTimes(1);

      resolveFirst('from-first');
      expect(await p1).toBe('from-first');
      resolveSecond('from-second');
      expect(await p2).toBe('from-second');

      expect((await cache.peek('github', 'repo'))?.value).toBe('from-first');
    });
  });

  describe('Cancellation', () => {
    it('should not compute when the signal already fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const compute = vi.fn(async () => 'value');

      await expect(
        cache.getOrCompute('weather', 'Seoul', 60_000, compute, { signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(compute).not.toHaveBeenCalled();
    });

    it('should write nothing when cancelled during compute', async () => {
      const controller = new AbortController();
      let finish: (value: string) => void = () => {};
      const compute = vi.fn(() => new Promise<string>(resolve => (finish = resolve)));

      const pending = cache.getOrCompute('weather', 'Seoul', 60_000, compute, { signal: controller.signal });
      await flushPromises();
      controller.abort();
      finish('too late');

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      await flushPromises();
      expect(await cache.peek('weather', 'Seoul')).toBeNull();
    });

    it('should pass the signal to compute', async () => {
      const controller = new AbortController();
      const compute = vi.fn(async (signal?: AbortSignal) => signal === controller.signal);

      expect(await cache.getOrCompute('weather', 'Seoul', 60_000, compute, { signal: controller.signal })).toBe(true);
    });
  });

  describe('remember / ttlFor', () => {
    it('should use the namespace TTL, falling back to the default', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T08:00:00Z'));
      const now = Date.now();

      await cache.remember(CacheNamespaces.WEATHER, 'Seoul', async () => 'sunny');
      await cache.remember('unconfigured', 'x', async () => 'y');

      expect((await cache.peek(CacheNamespaces.WEATHER, 'Seoul'))?.expiresAt).toBe(now + 30 * 60_000);
      expect((await cache.peek('unconfigured', 'x'))?.expiresAt).toBe(now + FALLBACK_CACHE_TTL_MS);
      expect(cache.ttlFor('unconfigured')).toBe(FALLBACK_CACHE_TTL_MS);
    });
  });

  describe('Invalidation', () => {
    it('should remove a single entry so the next call recomputes', async () => {
      const compute = vi.fn(async () => 'v');
      await cache.getOrCompute('weather', 'Seoul', 60_000, compute);

      expect(await cache.invalidate('weather', 'Seoul')).toBe(true);
      expect(await cache.invalidate('weather', 'Seoul')).toBe(false);

      await cache.getOrCompute('weather', 'Seoul', 60_000, compute);
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it('should clear a namespace and its nested namespaces only', async () => {
      const put = (ns: string, key: string) => cache.getOrCompute(ns, key, 60_000, async () => key);
      await put('garmin:health', 'sleep');
      await put('garmin:health', 'hrv');
      await put('garmin', 'profile');
      await put('garminx', 'other');
      await put('weather', 'Seoul');

      expect(await cache.invalidateNamespace('garmin:health')).toBe(2);
      expect(await cache.invalidateNamespace('garmin')).toBe(1);
      expect(await cache.invalidateNamespace('garmin')).toBe(0);

      expect((await store.keys('*')).sort()).toEqual(['cache:garminx:other', 'cache:weather:Seoul']);
    });

    it('should not clear keys of a nested-looking key in the parent namespace', async () => {
      await cache.getOrCompute('garmin', 'health:sleep', 60_000, async () => 'profile');
      await cache.getOrCompute('garmin:health', 'sleep', 60_000, async () => 'health-sleep');

      expect(await cache.invalidateNamespace('garmin:health')).toBe(1);
      expect(await cache.peek('garmin', 'health:sleep')).not.toBeNull();
    });

    it('should treat glob metacharacters in a namespace literally', async () => {
      const put = (ns: string, key: string) => cache.getOrCompute(ns, key, 60_000, async () => key);
      await put('weather', 'Seoul');
      await put('w', 'x');
      await put('w?', 'y');

      expect(await cache.invalidateNamespace('w*')).toBe(0);
      expect(await cache.invalidateNamespace('w?')).toBe(1);
      expect(await cache.invalidateNamespace('[w]')).toBe(0);
      expect((await store.keys('*')).sort()).toEqual(['cache:w:x', 'cache:weather:Seoul']);
    });
  });
});

describe('cacheKeyFromArgs', () => {
  it('should join scalars and sorted object entries', () => {
    expect(cacheKeyFromArgs('Seoul', { units: 'metric', lang: 'ko' })).toBe('Seoul:lang=ko:units=metric');
  });

  it('should skip empty objects', () => {
    expect(cacheKeyFromArgs('user', {}, 42, true)).toBe('user:42:true');
  });
});
