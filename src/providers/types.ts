/**
 * Provider-agnostic completion types
 *
 * Callers build a CompletionRequest once; each ProviderAdapter translates it
 * into its native shape and translates the native response back.
 */

import type { ProviderFailure } from '../infra/errors.js';

/**
 * JSON-schema object describing a tool's parameters
 */
export interface JsonSchemaObject {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [keyword: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** Must be an object schema; anything else is rejected at request-build time */
  parameters: JsonSchemaObject | Record<string, unknown>;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string; isError?: boolean };

export type ToolChoice = 'auto' | 'none' | 'required' | { name: string };

export interface CompletionRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
  /** Maximum tokens to generate (default: 1024) */
  maxTokens?: number;
  temperature?: number;
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'other';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * What an adapter extracts from a single native response
 */
export interface NormalizedCompletion {
  text: string;
  toolCalls: ToolCall[];
  stopReason: StopReason;
  usage: TokenUsage;
  /** Model identifier reported by the provider */
  model: string;
}

/**
 * Router result: the normalized completion plus how it was obtained
 */
export interface CompletionResponse extends NormalizedCompletion {
  provider: string;
  /** Providers that failed before this one, in attempt order */
  failures: ProviderFailure[];
}

export const DEFAULT_MAX_TOKENS = 1024;
