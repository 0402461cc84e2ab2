/**
 * Token Estimation Utilities
 *
 * Provides a rough, provider-independent token estimate for pre-flight
 * budgeting. This is NOT a billing-accurate count: it uses character-based
 * heuristics since exact tokenization requires each provider's tokenizer.
 * The same request always yields the same estimate.
 */

import type { ChatMessage, CompletionRequest, ToolDefinition } from '../providers/types.js';

/**
 * Rough estimation: ~4 characters per token for English text.
 */
const CHARS_PER_TOKEN = 4;

/**
 * Overhead tokens for message structure (role, formatting, etc.)
 */
const MESSAGE_OVERHEAD_TOKENS = 4;

/**
 * Overhead tokens for a tool declaration or tool call
 */
const TOOL_OVERHEAD_TOKENS = 20;

/**
 * Overhead tokens for tool result blocks
 */
const TOOL_RESULT_OVERHEAD_TOKENS = 10;

/**
 * Estimate token count for a string
 *
 * @example
 * ```typescript
 * estimateTokens('Hello, world!'); // 4
 * ```
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Estimate tokens for one message, including structural overhead
 */
export function estimateMessageTokens(message: ChatMessage): number {
  switch (message.role) {
    case 'system':
    case 'user':
      return MESSAGE_OVERHEAD_TOKENS + estimateTokens(message.content);

    case 'assistant': {
      const calls = (message.toolCalls ?? []).reduce(
        (sum, call) =>
          sum + TOOL_OVERHEAD_TOKENS + estimateTokens(call.name) + estimateTokens(JSON.stringify(call.arguments)),
        0
      );
      return MESSAGE_OVERHEAD_TOKENS + estimateTokens(message.content) + calls;
    }

    case 'tool':
      return MESSAGE_OVERHEAD_TOKENS + TOOL_RESULT_OVERHEAD_TOKENS + estimateTokens(message.content);
  }
}

/**
 * Estimate tokens for a tool declaration (name, description, schema)
 */
export function estimateToolTokens(tool: ToolDefinition): number {
  return (
    TOOL_OVERHEAD_TOKENS +
    estimateTokens(tool.name) +
    estimateTokens(tool.description) +
    estimateTokens(JSON.stringify(tool.parameters))
  );
}

/**
 * Estimate the prompt-side tokens of a completion request
 */
export function estimateRequestTokens(request: CompletionRequest): number {
  const messages = request.messages.reduce((sum, m) => sum + estimateMessageTokens(m), 0);
  const tools = (request.tools ?? []).reduce((sum, t) => sum + estimateToolTokens(t), 0);
  return messages + tools;
}
