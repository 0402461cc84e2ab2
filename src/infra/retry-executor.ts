/**
 * Retry Executor
 *
 * Runs an operation with bounded retries:
 * - Exponential backoff, capped at maxDelayMs
 * - Symmetric jitter to prevent thundering herd
 * - Caller-supplied classification of retryable errors
 * - Cancellation during the operation and during the sleep
 *
 * The executor never decides on its own which errors are transient. Wrapping a
 * non-idempotent operation is only safe when the caller makes it idempotent
 * (e.g. with an idempotency key).
 */

import { delay, raceAbort, throwIfAborted } from './abort.js';
import {
  CancelledError,
  ConfigurationError,
  RetriesExhaustedError,
  TransientIOError,
  toError,
} from './errors.js';

/**
 * Retry behaviour for one call site. Treated as immutable data.
 */
export interface RetryPolicy {
  /** Total attempts including the first one (>= 1) */
  readonly maxAttempts: number;
  /** Base delay in milliseconds for exponential backoff */
  readonly baseDelayMs: number;
  /** Maximum delay cap in milliseconds */
  readonly maxDelayMs: number;
  /** Jitter as a fraction of the delay, applied as +/- (0.2 = 20%) */
  readonly jitter: number;
  /** Whether a failure is worth another attempt */
  readonly retryable: (error: Error) => boolean;
}

export interface RetryAttemptInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  /** Sleep before the next attempt */
  delayMs: number;
  error: Error;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Name used in logs and in RetriesExhaustedError messages */
  label?: string;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface OperationContext {
  /** Current attempt (1-based) */
  attempt: number;
  signal?: AbortSignal;
}

export type RetryableOperation<T> = (context: OperationContext) => Promise<T>;

/**
 * Stock predicate: only errors explicitly classified as transient are retried
 */
export function transientErrorsOnly(error: Error): boolean {
  return error instanceof TransientIOError;
}

/**
 * Build a policy, filling unspecified fields from the defaults
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 300,
    maxDelayMs: 30_000,
    jitter: 0.1,
    retryable: transientErrorsOnly,
    ...overrides,
  };
  validatePolicy(policy);
  return Object.freeze(policy);
}

function validatePolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigurationError(`maxAttempts must be an integer >= 1 (got ${policy.maxAttempts})`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new ConfigurationError('Retry delays must be non-negative');
  }
  if (policy.jitter < 0 || policy.jitter > 1) {
    throw new ConfigurationError(`jitter must be within [0, 1] (got ${policy.jitter})`);
  }
}

/**
 * Un-jittered backoff for an attempt: min(maxDelay, baseDelay * 2^(attempt-1))
 */
export function baseBackoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

/**
 * Calculates the sleep after a failed attempt with exponential backoff and jitter
 *
 * A server-requested Retry-After raises the delay but never beyond maxDelayMs.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, error?: Error): number {
  const base = baseBackoffDelay(attempt, policy);

  // Jitter: delay +/- delay * jitter, uniformly distributed
  const offset = base * policy.jitter * (Math.random() * 2 - 1);
  let delayMs = base + offset;

  if (error instanceof TransientIOError && error.retryAfterMs !== undefined) {
    delayMs = Math.max(delayMs, error.retryAfterMs);
  }

  return Math.round(Math.min(policy.maxDelayMs, Math.max(0, delayMs)));
}

/**
 * Executes operations under a RetryPolicy
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor();
 * const profile = await executor.execute(
 *   ({ signal }) => fetchProfile(userId, signal),
 *   createRetryPolicy({ maxAttempts: 4 }),
 *   { signal, label: 'profile' }
 * );
 * ```
 */
export class RetryExecutor {
  private defaultPolicy: RetryPolicy;

  constructor(defaultPolicy?: Partial<RetryPolicy>) {
    this.defaultPolicy = createRetryPolicy(defaultPolicy);
  }

  getDefaultPolicy(): RetryPolicy {
    return this.defaultPolicy;
  }

  /**
   * Run the operation, retrying failures the policy marks as retryable
   *
   * @throws CancelledError when the signal fires
   * @throws RetriesExhaustedError when the last allowed attempt fails retryably
   * @throws the original error when the policy marks it non-retryable
   */
  async execute<T>(
    operation: RetryableOperation<T>,
    policy: RetryPolicy = this.defaultPolicy,
    options: ExecuteOptions = {}
  ): Promise<T> {
    validatePolicy(policy);
    const { signal, label = 'Operation', onRetry } = options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);

      try {
        return await raceAbort(operation({ attempt, signal }), signal);
      } catch (error) {
        const err = toError(error);

        if (err instanceof CancelledError) throw err;
        if (signal?.aborted) {
          throw new CancelledError(`${label} cancelled during attempt ${attempt}`, err);
        }

        if (!policy.retryable(err)) {
          throw err;
        }

        if (attempt >= policy.maxAttempts) {
          throw new RetriesExhaustedError(attempt, err, label);
        }

        const delayMs = computeBackoffDelay(attempt, policy, err);
        onRetry?.({ attempt, delayMs, error: err });
        console.warn(
          `[Retry] ${label} failed (attempt ${attempt}/${policy.maxAttempts}): ${err.message}. ` +
          `Retrying in ${delayMs}ms`
        );

        await delay(delayMs, signal);
      }
    }
  }
}
