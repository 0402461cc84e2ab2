/**
 * OpenAI Chat Completions Adapter
 */

import OpenAI from 'openai';
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

export const OPENAI_PROVIDER_ID = 'openai';

/**
 * The parts of a Chat Completions response the adapter reads
 */
export interface OpenAINativeResponse {
  model: string;
  choices: Array<{
    finish_reason: string | null;
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

type OpenAIRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

function mapToolChoice(choice: ToolChoice): OpenAI.Chat.ChatCompletionToolChoiceOption {
  if (typeof choice === 'string') return choice;
  return { type: 'function', function: { name: choice.name } };
}

function mapStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'stop':
      return 'end_turn';
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'other';
  }
}

/**
 * Translate a normalized request into Chat Completions parameters
 */
export function buildOpenAIRequest(request: CompletionRequest, model: string): OpenAIRequest {
  validateCommon(OPENAI_PROVIDER_ID, request);

  if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 2)) {
    throw new UnsupportedCapabilityError(
      OPENAI_PROVIDER_ID,
      'temperature',
      `${request.temperature} is outside [0, 2]`
    );
  }

  const messages = request.messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };

      case 'user':
        return { role: 'user', content: message.content };

      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: message.content };

      case 'tool':
        if (message.isError) {
          throw new UnsupportedCapabilityError(
            OPENAI_PROVIDER_ID,
            'tool error results',
            `tool result ${message.toolCallId} is flagged as an error`
          );
        }
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
  });

  const params: OpenAIRequest = {
    model,
    messages,
    max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
  };

  if (request.temperature !== undefined) params.temperature = request.temperature;

  if (request.tools && request.tools.length > 0) {
    params.tools = request.tools.map(tool => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: objectSchema(tool),
      },
    }));
  }
  if (request.toolChoice !== undefined) {
    params.tool_choice = mapToolChoice(request.toolChoice);
  }

  return params;
}

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = raw.trim() === '' ? {} : JSON.parse(raw);
  } catch {
    throw new PermanentRequestError(
      `OpenAI returned unparsable arguments for tool "${toolName}"`,
      'invalid_response'
    );
  }
  if (!isRecord(parsed)) {
    throw new PermanentRequestError(
      `OpenAI returned non-object arguments for tool "${toolName}"`,
      'invalid_response'
    );
  }
  return parsed;
}

/**
 * Translate a Chat Completions response into the normalized shape
 */
export function parseOpenAIResponse(response: OpenAINativeResponse): NormalizedCompletion {
  const choice = response.choices[0];
  if (!choice) {
    throw new PermanentRequestError('OpenAI returned no choices', 'invalid_response');
  }

  const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(call => ({
    id: call.id,
    name: call.function.name,
    arguments: parseArguments(call.function.arguments, call.function.name),
  }));

  return {
    text: choice.message.content ?? '',
    toolCalls,
    stopReason: mapStopReason(choice.finish_reason),
    usage: {
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
    },
    model: response.model,
  };
}

export class OpenAIAdapter implements ProviderAdapter<OpenAIRequest, OpenAINativeResponse> {
  readonly id = OPENAI_PROVIDER_ID;
  private client: OpenAI;

  constructor(client: OpenAI) {
    this.client = client;
  }

  static fromApiKey(apiKey: string, timeoutMs: number = 60_000): OpenAIAdapter {
    return new OpenAIAdapter(new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs }));
  }

  buildRequest(request: CompletionRequest, model: string): OpenAIRequest {
    return buildOpenAIRequest(request, model);
  }

  async send(nativeRequest: OpenAIRequest, signal?: AbortSignal): Promise<OpenAINativeResponse> {
    return this.client.chat.completions.create(nativeRequest, { signal });
  }

  parseResponse(nativeResponse: OpenAINativeResponse): NormalizedCompletion {
    return parseOpenAIResponse(nativeResponse);
  }
}
