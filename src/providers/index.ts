/**
 * Provider Exports
 */

import type { CoreConfig } from '../config/index.js';
import type { ProviderAdapter } from './adapter.js';
import { AnthropicAdapter } from './anthropic.js';
import { OpenAIAdapter } from './openai.js';

/**
 * Build an adapter for every provider whose credential is configured
 */
export function createProviderAdapters(config: Pick<CoreConfig, 'credentials'>): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = [];

  if (config.credentials.anthropic) {
    adapters.push(AnthropicAdapter.fromApiKey(config.credentials.anthropic));
  }
  if (config.credentials.openai) {
    adapters.push(OpenAIAdapter.fromApiKey(config.credentials.openai));
  }

  return adapters;
}

export {
  classifyProviderError,
  validateCommon,
  type ProviderAdapter,
} from './adapter.js';

export {
  AnthropicAdapter,
  ANTHROPIC_PROVIDER_ID,
  buildAnthropicRequest,
  parseAnthropicResponse,
  type AnthropicNativeResponse,
} from './anthropic.js';

export {
  OpenAIAdapter,
  OPENAI_PROVIDER_ID,
  buildOpenAIRequest,
  parseOpenAIResponse,
  type OpenAINativeResponse,
} from './openai.js';

export {
  ProviderRouter,
  type CompleteOptions,
  type ProviderRouterOptions,
} from './router.js';

export type {
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  JsonSchemaObject,
  NormalizedCompletion,
  StopReason,
  TokenUsage,
  ToolCall,
  ToolChoice,
  ToolDefinition,
} from './types.js';
