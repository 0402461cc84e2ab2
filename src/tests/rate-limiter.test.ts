/**
 * Rate Limiter Tests
 *
 * Token buckets over a shared store: refill, shared state across instances,
 * blocking acquire, cancellation and fail-closed behaviour.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RateLimiter, refillBucket } from '../infra/rate-limiter.js';
import { MemoryStore } from '../db/store.js';
import { CancelledError, ConfigurationError, LimiterUnavailableError } from '../infra/errors.js';
import { ContendedStore, UnreachableStore } from './fixtures/stores.fixtures.js';

const limits = {
  weather_api: { capacity: 5, refillPerSecond: 1 },
  github_api: { capacity: 2, refillPerSecond: 1 },
};

describe('Rate Limiter', () => {
  let store: MemoryStore;
  let limiter: RateLimiter;

  beforeEach(() => {
    store = new MemoryStore();
    limiter = new RateLimiter(store, limits);
  });

  afterEach(async () => {
    await store.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('refillBucket', () => {
    const config = { capacity: 10, refillPerSecond: 2 };

    it('should treat missing state as a full bucket', () => {
      expect(refillBucket(null, config, 5000)).toEqual({ tokens: 10, updatedAt: 5000 });
    });

    it('should add elapsed * rate, capped at capacity', () => {
      expect(refillBucket({ tokens: 1, updatedAt: 0 }, config, 1500)).toEqual({ tokens: 4, updatedAt: 1500 });
      expect(refillBucket({ tokens: 9, updatedAt: 0 }, config, 60_000)).toEqual({ tokens: 10, updatedAt: 60_000 });
    });

    it('should ignore clocks that move backwards', () => {
      expect(refillBucket({ tokens: 3, updatedAt: 2000 }, config, 1000)).toEqual({ tokens: 3, updatedAt: 1000 });
    });
  });

  describe('tryAcquire', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T08:00:00Z'));
    });

    it('should admit capacity requests, deny the next, and refill over time', async () => {
      const results: boolean[] = [];
      for (let i = 0; i < 6; i++) {
        results.push(await limiter.tryAcquire('weather_api'));
      }
      expect(results).toEqual([true, true, true, true, true, false]);

      vi.setSystemTime(Date.now() + 1000);
      expect(await limiter.tryAcquire('weather_api')).toBe(true);
      expect(await limiter.tryAcquire('weather_api')).toBe(false);
    });

    it('should take several tokens at once', async () => {
      expect(await limiter.tryAcquire('weather_api', 4)).toBe(true);
      expect(await limiter.tryAcquire('weather_api', 2)).toBe(false);
      expect(await limiter.tryAcquire('weather_api', 1)).toBe(true);
    });

    it('should persist bucket state under the key prefix', async () => {
      await limiter.tryAcquire('weather_api', 2);
      const raw = await store.get('ratelimit:weather_api');
      expect(raw).not.toBeNull();
      expect(JSON.parse(raw ?? '{}')).toEqual({ tokens: 3, updatedAt: Date.now() });
    });

    it('should share one bucket between limiter instances on the same store', async () => {
      const other = new RateLimiter(store, limits);
      await limiter.tryAcquire('weather_api', 3);

      expect(await other.tryAcquire('weather_api', 3)).toBe(false);
      expect(await other.tryAcquire('weather_api', 2)).toBe(true);
      expect(await limiter.tryAcquire('weather_api')).toBe(false);
    });

    it('should never over-admit concurrent callers', async () => {
      const results = await Promise.all(Array.from({ length: 10 }, () => limiter.tryAcquire('weather_api')));
      expect(results.filter(Boolean)).toHaveLength(5);
    });

    it('should keep buckets per resource independent', async () => {
      await limiter.tryAcquire('github_api', 2);
      expect(await limiter.tryAcquire('github_api')).toBe(false);
      expect(await limiter.tryAcquire('weather_api')).toBe(true);
    });

    it('should refuse more tokens than capacity without touching the bucket', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(await limiter.tryAcquire('github_api', 3)).toBe(false);
      expect((await limiter.inspect('github_api')).tokens).toBe(2);
    });

    it('should treat undecodable state as an empty bucket and refill from there', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await store.set('ratelimit:weather_api', 'not json');

      expect(await limiter.tryAcquire('weather_api')).toBe(false);
      expect(warn).toHaveBeenCalledWith('[RateLimiter] weather_api: undecodable bucket state, treating as empty');
      expect(JSON.parse((await store.get('ratelimit:weather_api')) ?? '{}')).toEqual({
        tokens: 0,
        updatedAt: Date.now(),
      });

      vi.setSystemTime(Date.now() + 2000);
      expect(await limiter.tryAcquire('weather_api', 2)).toBe(true);
      expect(await limiter.tryAcquire('weather_api')).toBe(false);
    });

    it('should report out-of-range state as empty', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      await store.set('ratelimit:github_api', JSON.stringify({ tokens: -3, updatedAt: 0 }));

      expect(await limiter.inspect('github_api')).toEqual({
        resource: 'github_api',
        tokens: 0,
        capacity: 2,
        waitMs: 1000,
      });
    });

    it('should reject unknown resources and non-positive requests', async () => {
      await expect(limiter.tryAcquire('unknown_api')).rejects.toBeInstanceOf(ConfigurationError);
      await expect(limiter.tryAcquire('weather_api', 0)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('inspect / reset / summary', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T08:00:00Z'));
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('should report tokens and the wait for the next one', async () => {
      await limiter.tryAcquire('github_api', 2);
      expect(await limiter.inspect('github_api')).toEqual({
        resource: 'github_api',
        tokens: 0,
        capacity: 2,
        waitMs: 1000,
      });
    });

    it('should restore a full bucket on reset', async () => {
      await limiter.tryAcquire('weather_api', 5);
      await limiter.reset('weather_api');
      expect((await limiter.inspect('weather_api')).tokens).toBe(5);
    });

    it('should summarize every configured bucket', async () => {
      await limiter.tryAcquire('github_api', 2);
      const summary = await limiter.getSummary();
      expect(summary.total).toBe(2);
      expect(summary.exhausted).toBe(1);
      expect(summary.buckets.map(b => b.resource)).toEqual(['weather_api', 'github_api']);
    });
  });

  describe('acquire', () => {
    const fast = { burst: { capacity: 1, refillPerSecond: 20 }, slow: { capacity: 2, refillPerSecond: 1 } };

    beforeEach(() => {
      limiter = new RateLimiter(store, fast);
    });

    it('should wait for a refill when within maxWaitMs', async () => {
      expect(await limiter.tryAcquire('burst')).toBe(true);

      const started = Date.now();
      expect(await limiter.acquire('burst', 1, 1000)).toBe(true);
      expect(Date.now() - started).toBeGreaterThanOrEqual(40);
    });

    it('should return false immediately when the refill cannot arrive in time', async () => {
      await limiter.tryAcquire('slow', 2);

      const started = Date.now();
      expect(await limiter.acquire('slow', 1, 200)).toBe(false);
      expect(Date.now() - started).toBeLessThan(100);
    });

    it('should behave like tryAcquire with maxWaitMs 0', async () => {
      await limiter.tryAcquire('slow', 2);
      expect(await limiter.acquire('slow')).toBe(false);
    });

    it('should throw CancelledError while waiting and spend nothing', async () => {
      await limiter.tryAcquire('slow', 1);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);

      await expect(limiter.acquire('slow', 2, 5000, controller.signal)).rejects.toBeInstanceOf(CancelledError);

      const { tokens } = await limiter.inspect('slow');
      expect(tokens).toBeGreaterThanOrEqual(1);
      expect(tokens).toBeLessThan(2);
    });

    it('should not touch the bucket when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire('slow', 1, 1000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(await store.get('ratelimit:slow')).toBeNull();
    });
  });

  describe('Fail closed', () => {
    it('should raise LimiterUnavailableError when the store is unreachable', async () => {
      const broken = new RateLimiter(new UnreachableStore(), limits);

      const error = await broken.tryAcquire('weather_api').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(LimiterUnavailableError);
      if (!(error instanceof LimiterUnavailableError)) return;
      expect(error.resource).toBe('weather_api');
    });

    it('should give up after the configured number of contended rounds', async () => {
      const contended = new ContendedStore();
      const busy = new RateLimiter(contended, limits, { maxContentionRounds: 3 });

      await expect(busy.tryAcquire('weather_api')).rejects.toBeInstanceOf(LimiterUnavailableError);
      expect(contended.casCalls).toBe(3);
      await contended.close();
    });
  });
});
