/**
 * Retry Executor Tests
 *
 * - Bounded attempts with retryable / non-retryable classification
 * - Exponential backoff, cap and jitter bounds
 * - Retry-After hints
 * - Cancellation before, during and between attempts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  RetryExecutor,
  baseBackoffDelay,
  computeBackoffDelay,
  createRetryPolicy,
} from '../infra/retry-executor.js';
import {
  CancelledError,
  ConfigurationError,
  PermanentRequestError,
  RetriesExhaustedError,
  TransientIOError,
} from '../infra/errors.js';

const instant = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 });

describe('RetryExecutor', () => {
  let executor: RetryExecutor;

  beforeEach(() => {
    executor = new RetryExecutor();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Attempts', () => {
    it('should succeed on the third attempt after two transient failures', async () => {
      const seen: number[] = [];
      const operation = vi.fn(async ({ attempt }: { attempt: number }) => {
        seen.push(attempt);
        if (attempt < 3) throw new TransientIOError('connection reset');
        return 'ok';
      });

      await expect(executor.execute(operation, instant)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(seen).toEqual([1, 2, 3]);
    });

    it('should rethrow a non-retryable error after one call', async () => {
      const rejection = new PermanentRequestError('missing field "city"');
      const operation = vi.fn(async () => {
        throw rejection;
      });

      await expect(executor.execute(operation, instant)).rejects.toBe(rejection);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should wrap the last error once attempts run out', async () => {
      let call = 0;
      const operation = async () => {
        call++;
        throw new TransientIOError(`timeout #${call}`);
      };

      const error = await executor
        .execute(operation, createRetryPolicy({ ...instant, maxAttempts: 2 }), { label: 'weather' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetriesExhaustedError);
      if (!(error instanceof RetriesExhaustedError)) return;
      expect(error.attempts).toBe(2);
      expect(error.lastError.message).toBe('timeout #2');
      expect(error.message).toBe('weather failed after 2 attempt(s): timeout #2');
    });

    it('should honour a caller-supplied retryable predicate', async () => {
      const policy = createRetryPolicy({ ...instant, retryable: e => e.message === 'again' });
      let call = 0;
      const operation = vi.fn(async () => {
        call++;
        if (call === 1) throw new Error('again');
        throw new Error('stop');
      });

      await expect(executor.execute(operation, policy)).rejects.toThrow('stop');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should make exactly one call with maxAttempts 1', async () => {
      const operation = vi.fn(async () => {
        throw new TransientIOError('busy');
      });

      await expect(
        executor.execute(operation, createRetryPolicy({ ...instant, maxAttempts: 1 }))
      ).rejects.toBeInstanceOf(RetriesExhaustedError);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error throwables', async () => {
      const policy = createRetryPolicy({ ...instant, retryable: () => false });
      await expect(
        executor.execute(async () => {
          throw 'plain string';
        }, policy)
      ).rejects.toThrow('plain string');
    });

    it('should reject an invalid policy', () => {
      expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(ConfigurationError);
      expect(() => createRetryPolicy({ jitter: 1.5 })).toThrow(ConfigurationError);
      expect(() => createRetryPolicy({ baseDelayMs: -1 })).toThrow(ConfigurationError);
    });
  });

  describe('Backoff', () => {
    it('should report capped, non-decreasing delays to onRetry', async () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      const policy = createRetryPolicy({ maxAttempts: 4, baseDelayMs: 10, maxDelayMs: 15, jitter: 0.2 });
      const delays: number[] = [];

      const result = await executor.execute(
        async ({ attempt }) => {
          if (attempt < 4) throw new TransientIOError('flaky');
          return attempt;
        },
        policy,
        { onRetry: info => delays.push(info.delayMs) }
      );

      expect(result).toBe(4);
      expect(delays).toEqual([10, 15, 15]);
    });

    it('should double the un-jittered delay per attempt up to the cap', () => {
      const policy = { baseDelayMs: 500, maxDelayMs: 4000 };
      expect([1, 2, 3, 4, 5].map(a => baseBackoffDelay(a, policy))).toEqual([500, 1000, 2000, 4000, 4000]);
    });

    it('should keep jitter within +/- the configured fraction', () => {
      const policy = createRetryPolicy({ baseDelayMs: 100, maxDelayMs: 10_000, jitter: 0.2 });
      const random = vi.spyOn(Math, 'random');

      random.mockReturnValue(0);
      expect(computeBackoffDelay(1, policy)).toBe(80);
      random.mockReturnValue(1);
      expect(computeBackoffDelay(1, policy)).toBe(120);
      random.mockReturnValue(0.5);
      expect(computeBackoffDelay(3, policy)).toBe(400);
    });

    it('should never exceed maxDelayMs, jitter included', () => {
      vi.spyOn(Math, 'random').mockReturnValue(1);
      const policy = createRetryPolicy({ baseDelayMs: 500, maxDelayMs: 4000, jitter: 0.2 });
      expect(computeBackoffDelay(10, policy)).toBe(4000);
    });

    it('should raise the delay to a Retry-After hint, capped at maxDelayMs', () => {
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      const policy = createRetryPolicy({ baseDelayMs: 100, maxDelayMs: 4000, jitter: 0.2 });

      const soon = new TransientIOError('429', { statusCode: 429, retryAfterMs: 2500 });
      const late = new TransientIOError('429', { statusCode: 429, retryAfterMs: 60_000 });

      expect(computeBackoffDelay(1, policy, soon)).toBe(2500);
      expect(computeBackoffDelay(1, policy, late)).toBe(4000);
    });
  });

  describe('Cancellation', () => {
    it('should not start when the signal already fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn(async () => 'never');

      await expect(executor.execute(operation, instant, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError
      );
      expect(operation).not.toHaveBeenCalled();
    });

    it('should stop waiting on an in-flight attempt', async () => {
      const controller = new AbortController();
      const pending = executor.execute(() => new Promise<string>(() => {}), instant, {
        signal: controller.signal,
      });

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('should cancel during the backoff sleep without another attempt', async () => {
      const controller = new AbortController();
      const policy = createRetryPolicy({ maxAttempts: 5, baseDelayMs: 60_000, maxDelayMs: 60_000, jitter: 0 });
      const operation = vi.fn(async () => {
        throw new TransientIOError('unavailable');
      });

      await expect(
        executor.execute(operation, policy, {
          signal: controller.signal,
          onRetry: () => controller.abort(),
        })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should propagate CancelledError even when the predicate would retry it', async () => {
      const policy = createRetryPolicy({ ...instant, retryable: () => true });
      const operation = vi.fn(async () => {
        throw new CancelledError('caller gave up');
      });

      await expect(executor.execute(operation, policy)).rejects.toThrow('caller gave up');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
