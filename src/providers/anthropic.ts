/**
 * Anthropic Claude Adapter
 *
 * Differences from the normalized shape:
 * - System messages are hoisted into the top-level `system` field
 * - Tool results travel as `tool_result` blocks inside a user turn
 * - Consecutive turns with the same role are merged (the API requires alternation)
 */

import Anthropic from '@anthropic-ai/sdk';
import { PermanentRequestError, UnsupportedCapabilityError } from '../infra/errors.js';
import { isRecord, objectSchema, validateCommon, type ProviderAdapter } from './adapter.js';
import {
  DEFAULT_MAX_TOKENS,
  type CompletionRequest,
  type NormalizedCompletion,
  type StopReason,
  type ToolCall,
  type ToolChoice,
} from './types.js';

export const ANTHROPIC_PROVIDER_ID = 'anthropic';

/**
 * The parts of a Messages API response the adapter reads
 */
export interface AnthropicNativeResponse {
  model: string;
  stop_reason: string | null;
  content: Array<{ type: string; text?: string; id?: string; name?: string; input?: unknown }>;
  usage: { input_tokens: number; output_tokens: number };
}

type AnthropicRequest = Anthropic.MessageCreateParamsNonStreaming;

function mapToolChoice(choice: ToolChoice): Anthropic.ToolChoice {
  if (choice === 'auto') return { type: 'auto' };
  if (choice === 'required') return { type: 'any' };
  if (choice === 'none') {
    throw new UnsupportedCapabilityError(ANTHROPIC_PROVIDER_ID, 'tool choice', '"none" cannot be expressed');
  }
  return { type: 'tool', name: choice.name };
}

function mapStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'end_turn';
    case 'tool_use':
      return 'tool_use';
    case 'max_tokens':
      return 'max_tokens';
    default:
      return 'other';
  }
}

/**
 * Translate a normalized request into Messages API parameters
 */
export function buildAnthropicRequest(request: CompletionRequest, model: string): AnthropicRequest {
  validateCommon(ANTHROPIC_PROVIDER_ID, request);

  if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 1)) {
    throw new UnsupportedCapabilityError(
      ANTHROPIC_PROVIDER_ID,
      'temperature',
      `${request.temperature} is outside [0, 1]`
    );
  }

  const system: string[] = [];
  const messages: Anthropic.MessageParam[] = [];

  const pushTurn = (role: 'user' | 'assistant', blocks: Anthropic.ContentBlockParam[]) => {
    const last = messages[messages.length - 1];
    if (last && last.role === role && Array.isArray(last.content)) {
      last.content.push(...blocks);
      return;
    }
    messages.push({ role, content: blocks });
  };

  for (const message of request.messages) {
    switch (message.role) {
      case 'system':
        system.push(message.content);
        break;

      case 'user':
        pushTurn('user', [{ type: 'text', text: message.content }]);
        break;

      case 'assistant': {
        const blocks: Anthropic.ContentBlockParam[] = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        if (blocks.length === 0) {
          throw new PermanentRequestError('Assistant message has neither text nor tool calls');
        }
        pushTurn('assistant', blocks);
        break;
      }

      case 'tool':
        pushTurn('user', [
          {
            type: 'tool_result',
            tool_use_id: message.toolCallId,
            content: message.content,
            ...(message.isError ? { is_error: true } : {}),
          },
        ]);
        break;
    }
  }

  if (messages.length === 0) {
    throw new UnsupportedCapabilityError(
      ANTHROPIC_PROVIDER_ID,
      'system-only conversation',
      'at least one user or assistant message is required'
    );
  }

  const params: AnthropicRequest = {
    model,
    max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
    messages,
  };

  if (system.length > 0) params.system = system.join('\n\n');
  if (request.temperature !== undefined) params.temperature = request.temperature;

  if (request.tools && request.tools.length > 0) {
    params.tools = request.tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: objectSchema(tool),
    }));
  }
  if (request.toolChoice !== undefined) {
    params.tool_choice = mapToolChoice(request.toolChoice);
  }

  return params;
}

/**
 * Translate a Messages API response into the normalized shape
 */
export function parseAnthropicResponse(response: AnthropicNativeResponse): NormalizedCompletion {
  const textParts: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of response.content) {
    if (block.type === 'text' && typeof block.text === 'string') {
      textParts.push(block.text);
    } else if (block.type === 'tool_use') {
      if (!block.id || !block.name || !isRecord(block.input)) {
        throw new PermanentRequestError(
          'Anthropic returned a malformed tool_use block',
          'invalid_response'
        );
      }
      toolCalls.push({ id: block.id, name: block.name, arguments: block.input });
    }
  }

  return {
    text: textParts.join(''),
    toolCalls,
    stopReason: mapStopReason(response.stop_reason),
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
    model: response.model,
  };
}

export class AnthropicAdapter implements ProviderAdapter<AnthropicRequest, AnthropicNativeResponse> {
  readonly id = ANTHROPIC_PROVIDER_ID;
  private client: Anthropic;

  /**
   * @param client - SDK client; pass one created with `maxRetries: 0` so the
   *   router's RetryExecutor is the only retry layer
   */
  constructor(client: Anthropic) {
    this.client = client;
  }

  static fromApiKey(apiKey: string, timeoutMs: number = 60_000): AnthropicAdapter {
    return new AnthropicAdapter(new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs }));
  }

  buildRequest(request: CompletionRequest, model: string): AnthropicRequest {
    return buildAnthropicRequest(request, model);
  }

  async send(nativeRequest: AnthropicRequest, signal?: AbortSignal): Promise<AnthropicNativeResponse> {
    return this.client.messages.create(nativeRequest, { signal });
  }

  parseResponse(nativeResponse: AnthropicNativeResponse): NormalizedCompletion {
    return parseAnthropicResponse(nativeResponse);
  }
}
