/**
 * Infrastructure Utilities
 *
 * Common infrastructure modules for resilient operations.
 */

export { delay, raceAbort, throwIfAborted } from './abort.js';

export {
  CancelledError,
  ConfigurationError,
  LimiterUnavailableError,
  PermanentRequestError,
  ProvidersExhaustedError,
  RetriesExhaustedError,
  StoreUnavailableError,
  TransientIOError,
  UnsupportedCapabilityError,
  classifyHttpStatus,
  errorForStatus,
  isCancelledError,
  isProvidersExhaustedError,
  isRateLimitError,
  isTransientError,
  toError,
  type PermanentErrorKind,
  type ProviderFailure,
  type StatusClass,
} from './errors.js';

export {
  RetryExecutor,
  baseBackoffDelay,
  computeBackoffDelay,
  createRetryPolicy,
  transientErrorsOnly,
  type ExecuteOptions,
  type OperationContext,
  type RetryAttemptInfo,
  type RetryPolicy,
  type RetryableOperation,
} from './retry-executor.js';

export {
  resilientFetch,
  isNetworkError,
  parseRetryAfter,
  type ResilientFetchOptions,
} from './resilient-fetch.js';

export {
  RateLimiter,
  refillBucket,
  type BucketSnapshot,
  type BucketState,
  type RateLimiterOptions,
} from './rate-limiter.js';
