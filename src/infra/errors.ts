/**
 * Error Taxonomy
 *
 * Every failure the core surfaces is one of these classes, so callers can
 * decide between "try again later" and "request rejected" without parsing
 * messages.
 */

/**
 * Network or timeout failure expected to succeed on a later attempt
 */
export class TransientIOError extends Error {
  /** HTTP status code if the failure came from a response */
  readonly statusCode?: number;
  /** Server-requested wait (Retry-After) in milliseconds */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { statusCode?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransientIOError';
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * The key/value backing service could not be reached
 */
export class StoreUnavailableError extends TransientIOError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export type PermanentErrorKind = 'invalid_request' | 'authentication' | 'invalid_response';

/**
 * Failure that will not go away on retry (bad input, rejected credentials,
 * a response we cannot interpret)
 */
export class PermanentRequestError extends Error {
  readonly kind: PermanentErrorKind;
  readonly statusCode?: number;

  constructor(
    message: string,
    kind: PermanentErrorKind = 'invalid_request',
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PermanentRequestError';
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

/**
 * Rate limiter could not consult its shared bucket state (fails closed)
 */
export class LimiterUnavailableError extends Error {
  readonly resource: string;

  constructor(resource: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LimiterUnavailableError';
    this.resource = resource;
  }
}

/**
 * Retryable failures persisted through every allowed attempt
 */
export class RetriesExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error, label?: string) {
    super(
      `${label ?? 'Operation'} failed after ${attempts} attempt(s): ${lastError.message}`,
      { cause: lastError }
    );
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * A provider cannot express something the normalized request asks for
 */
export class UnsupportedCapabilityError extends Error {
  readonly provider: string;
  readonly capability: string;

  constructor(provider: string, capability: string, detail: string) {
    super(`${provider} does not support ${capability}: ${detail}`);
    this.name = 'UnsupportedCapabilityError';
    this.provider = provider;
    this.capability = capability;
  }
}

/**
 * One failed provider attempt in a tier
 */
export interface ProviderFailure {
  provider: string;
  model: string;
  /** Error class name, e.g. TransientIOError */
  reason: string;
  message: string;
  error: Error;
}

/**
 * Every provider in the tier failed
 */
export class ProvidersExhaustedError extends Error {
  readonly tier: string;
  readonly failures: readonly ProviderFailure[];

  constructor(tier: string, failures: ProviderFailure[]) {
    const summary = failures.map(f => `${f.provider}/${f.model}: ${f.message}`).join('; ');
    super(`All providers for tier "${tier}" failed (${failures.length}): ${summary}`);
    this.name = 'ProvidersExhaustedError';
    this.tier = tier;
    this.failures = Object.freeze([...failures]);
  }
}

/**
 * The operation observed an external cancellation signal
 */
export class CancelledError extends Error {
  constructor(message: string = 'Operation cancelled', cause?: unknown) {
    super(message, { cause });
    this.name = 'CancelledError';
  }
}

/**
 * Static configuration is missing or invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * HTTP status codes that are considered retryable
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  425, // Too Early
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
  522, // Connection Timed Out (Cloudflare)
  524, // A Timeout Occurred (Cloudflare)
  529, // Overloaded (Anthropic)
]);

export type StatusClass =
  | { retryable: true }
  | { retryable: false; kind: PermanentErrorKind };

/**
 * Map an HTTP status code onto the taxonomy
 */
export function classifyHttpStatus(status: number): StatusClass {
  if (RETRYABLE_STATUS_CODES.has(status) || status >= 500) {
    return { retryable: true };
  }
  if (status === 401 || status === 403) {
    return { retryable: false, kind: 'authentication' };
  }
  return { retryable: false, kind: 'invalid_request' };
}

/**
 * Build the matching taxonomy error for a failed HTTP exchange
 */
export function errorForStatus(
  status: number,
  message: string,
  options: { retryAfterMs?: number; cause?: unknown } = {}
): TransientIOError | PermanentRequestError {
  const classified = classifyHttpStatus(status);
  if (classified.retryable) {
    return new TransientIOError(message, { statusCode: status, ...options });
  }
  return new PermanentRequestError(message, classified.kind, {
    statusCode: status,
    cause: options.cause,
  });
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isTransientError(error: unknown): error is TransientIOError {
  return error instanceof TransientIOError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function isProvidersExhaustedError(error: unknown): error is ProvidersExhaustedError {
  return error instanceof ProvidersExhaustedError;
}

/**
 * Check if an error was caused by remote rate limiting
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof TransientIOError) {
    return error.statusCode === 429;
  }
  if (error instanceof RetriesExhaustedError) {
    return isRateLimitError(error.lastError);
  }
  return false;
}
