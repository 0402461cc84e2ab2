/**
 * Provider Adapter contract
 *
 * One implementation per inference provider. The router only ever talks to
 * this interface; provider differences live entirely in the adapters.
 */

import {
  CancelledError,
  PermanentRequestError,
  ProvidersExhaustedError,
  RetriesExhaustedError,
  TransientIOError,
  UnsupportedCapabilityError,
  errorForStatus,
  toError,
} from '../infra/errors.js';
import { isNetworkError, parseRetryAfter } from '../infra/resilient-fetch.js';
import type { CompletionRequest, NormalizedCompletion, ToolDefinition } from './types.js';

export interface ProviderAdapter<TRequest = unknown, TResponse = unknown> {
  /** Provider id as referenced by tier configuration */
  readonly id: string;
  /**
   * Translate the normalized request into the provider's native shape
   *
   * @throws UnsupportedCapabilityError for constructs the provider cannot express
   * @throws PermanentRequestError for requests no provider could serve
   */
  buildRequest(request: CompletionRequest, model: string): TRequest;
  /** Perform the network call; errors are classified by the router */
  send(nativeRequest: TRequest, signal?: AbortSignal): Promise<TResponse>;
  /** Translate the native response back into the normalized shape */
  parseResponse(nativeResponse: TResponse): NormalizedCompletion;
}

/**
 * Tool names both providers accept
 */
const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks shared by every adapter before translation
 */
export function validateCommon(provider: string, request: CompletionRequest): void {
  if (request.messages.length === 0) {
    throw new PermanentRequestError('Completion request has no messages');
  }
  if (request.maxTokens !== undefined && (!Number.isInteger(request.maxTokens) || request.maxTokens < 1)) {
    throw new PermanentRequestError(`maxTokens must be a positive integer (got ${request.maxTokens})`);
  }

  const tools = request.tools ?? [];
  const names = new Set<string>();
  for (const tool of tools) {
    validateTool(provider, tool);
    if (names.has(tool.name)) {
      throw new PermanentRequestError(`Duplicate tool name "${tool.name}"`);
    }
    names.add(tool.name);
  }

  const choice = request.toolChoice;
  if ((choice === 'required' || typeof choice === 'object') && tools.length === 0) {
    throw new PermanentRequestError('toolChoice requires at least one tool declaration');
  }
  if (typeof choice === 'object' && !names.has(choice.name)) {
    throw new PermanentRequestError(`toolChoice names undeclared tool "${choice.name}"`);
  }
}

function validateTool(provider: string, tool: ToolDefinition): void {
  if (!TOOL_NAME_PATTERN.test(tool.name)) {
    throw new UnsupportedCapabilityError(
      provider,
      'tool name',
      `"${tool.name}" must match ${TOOL_NAME_PATTERN.source}`
    );
  }
  if (!isRecord(tool.parameters) || tool.parameters.type !== 'object') {
    throw new UnsupportedCapabilityError(
      provider,
      'tool parameters',
      `"${tool.name}" parameters must be a JSON schema of type "object"`
    );
  }
}

/**
 * Tool parameters as an object schema (validated by validateCommon)
 */
export function objectSchema(tool: ToolDefinition): { type: 'object'; [keyword: string]: unknown } {
  return { ...tool.parameters, type: 'object' };
}

function numericStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function retryAfterHeader(error: Error): number | undefined {
  if (!('headers' in error) || !isRecord(error.headers)) return undefined;
  const value = error.headers['retry-after'];
  return typeof value === 'string' ? parseRetryAfter(value) ?? undefined : undefined;
}

/**
 * Map whatever an SDK threw onto the taxonomy
 *
 * Both provider SDKs expose `status` (and `headers`) on API errors and name
 * their transport failures APIConnectionError / APIConnectionTimeoutError.
 */
export function classifyProviderError(provider: string, error: unknown, signal?: AbortSignal): Error {
  const err = toError(error);

  if (
    err instanceof TransientIOError ||
    err instanceof PermanentRequestError ||
    err instanceof UnsupportedCapabilityError ||
    err instanceof CancelledError ||
    err instanceof RetriesExhaustedError ||
    err instanceof ProvidersExhaustedError
  ) {
    return err;
  }

  // SDK error classes do not always set `name`; the constructor name is reliable
  const names = `${err.name} ${err.constructor.name}`;

  if (signal?.aborted || /APIUserAbortError|AbortError/.test(names)) {
    return new CancelledError(`${provider} request cancelled`, err);
  }

  const status = numericStatus(err);
  if (status !== undefined) {
    return errorForStatus(status, `${provider}: ${err.message}`, {
      retryAfterMs: status === 429 ? retryAfterHeader(err) : undefined,
      cause: err,
    });
  }

  if (/connection|timeout/i.test(names) || isNetworkError(err)) {
    return new TransientIOError(`${provider}: ${err.message}`, { cause: err });
  }

  return new PermanentRequestError(`${provider}: ${err.message}`, 'invalid_response', { cause: err });
}
