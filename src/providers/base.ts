/**
 * @fileoverview Helpers around the provider-agnostic contract.
 *
 * Vendor integrations implement {@link ProviderRoundTrip}; the engine only
 * needs to read their responses and build the next request's messages.
 *
 * @module agent-loop-engine/providers
 */

import type {
  ContentBlock,
  LLMMessage,
  MessageContent,
  ProviderResponse,
  TokenUsage,
} from '../types/provider.types.js';
import { StopReason } from '../types/provider.types.js';
import type { ToolCallInfo, ToolResultInfo } from '../types/core.types.js';

/**
 * Concatenated text of a response, or null when it has none.
 */
export function extractText(response: ProviderResponse): string | null {
  const text = response.content
    .map(block => (block.type === 'text' ? block.text : ''))
    .join('');
  return text.length > 0 ? text : null;
}

/**
 * Tool calls of a response, in model-authored order.
 */
export function extractToolCalls(response: ProviderResponse): ToolCallInfo[] {
  const calls: ToolCallInfo[] = [];
  for (const block of response.content) {
    if (block.type === 'toolUse') {
      calls.push({ id: block.id, name: block.name, arguments: block.arguments });
    }
  }
  return calls;
}

/**
 * Whether the model asked for tools, either by stop reason or by content.
 */
export function hasToolCalls(response: ProviderResponse): boolean {
  return response.stopReason === StopReason.TOOL_USE
    || response.content.some(block => block.type === 'toolUse');
}

export function userMessage(text: string): LLMMessage {
  return { role: 'user', contents: [{ type: 'text', text }] };
}

export function assistantMessage(text: string): LLMMessage {
  return { role: 'assistant', contents: [{ type: 'text', text }] };
}

/**
 * Converts a response into the assistant turn that records it.
 * Empty text blocks are dropped; returns null when nothing remains.
 */
export function messageFromResponse(response: ProviderResponse): LLMMessage | null {
  const contents: MessageContent[] = [];
  for (const block of response.content) {
    if (block.type === 'text') {
      if (block.text.length > 0) {
        contents.push({ type: 'text', text: block.text });
      }
    } else {
      contents.push({ type: 'toolUse', id: block.id, name: block.name, arguments: block.arguments });
    }
  }
  return contents.length > 0 ? { role: 'assistant', contents } : null;
}

/**
 * The user turn carrying a round of tool results.
 */
export function toolResultsMessage(results: ReadonlyArray<ToolResultInfo>): LLMMessage {
  return {
    role: 'user',
    contents: results.map(result => ({
      type: 'toolResult' as const,
      toolCallId: result.id,
      name: result.name,
      content: result.output,
      isError: result.isError,
    })),
  };
}

// ============ Response builders ============

const EMPTY_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0 };

/**
 * Builds a text-only response. Handy for stand-in providers.
 */
export function textResponse(text: string, usage: TokenUsage = EMPTY_USAGE): ProviderResponse {
  return {
    content: [{ type: 'text', text }],
    stopReason: StopReason.END_TURN,
    usage,
    model: 'scripted',
  };
}

/**
 * Builds a tool-use response, optionally preceded by prose.
 */
export function toolUseResponse(
  calls: ReadonlyArray<{ id: string; name: string; arguments: string | Record<string, unknown> }>,
  prose?: string,
  usage: TokenUsage = EMPTY_USAGE,
): ProviderResponse {
  const content: ContentBlock[] = [];
  if (prose !== undefined) {
    content.push({ type: 'text', text: prose });
  }
  for (const call of calls) {
    content.push({
      type: 'toolUse',
      id: call.id,
      name: call.name,
      arguments: typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments),
    });
  }
  return { content, stopReason: StopReason.TOOL_USE, usage, model: 'scripted' };
}
