/**
 * @fileoverview Provider-agnostic request/response contract.
 *
 * The engine never talks to a vendor directly. It speaks these types to a
 * {@link ProviderRoundTrip}, and each vendor integration translates them to
 * and from its own wire format.
 *
 * @module agent-loop-engine/types/provider
 * @version 0.1.0
 */

/**
 * Arbitrary JSON Schema document.
 */
export type JsonSchema = Readonly<Record<string, unknown>>;

export type MessageRole = 'user' | 'assistant';

/**
 * One content part of a conversation message.
 */
export type MessageContent =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'toolUse'; readonly id: string; readonly name: string; readonly arguments: string }
  | {
      readonly type: 'toolResult';
      readonly toolCallId: string;
      readonly name: string;
      readonly content: string;
      readonly isError: boolean;
    };

/**
 * A single conversation turn.
 */
export interface LLMMessage {
  readonly role: MessageRole;
  readonly contents: ReadonlyArray<MessageContent>;
}

/**
 * A block of model output, in the order the model produced it.
 */
export type ContentBlock =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'toolUse'; readonly id: string; readonly name: string; readonly arguments: string };

/**
 * Why the model stopped generating.
 */
export enum StopReason {
  END_TURN = 'end_turn',
  MAX_TOKENS = 'max_tokens',
  STOP_SEQUENCE = 'stop_sequence',
  TOOL_USE = 'tool_use',
}

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

/**
 * How the model may choose among the offered tools.
 */
export type ToolChoice =
  | { readonly type: 'auto' }
  | { readonly type: 'required' }
  | { readonly type: 'none' }
  | { readonly type: 'tool'; readonly name: string };

/**
 * Provider-agnostic tool description sent with each request.
 */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
}

/**
 * One request to a model.
 */
export interface ProviderRequest {
  readonly messages: ReadonlyArray<LLMMessage>;
  readonly tools: ReadonlyArray<ToolSchema>;
  readonly toolChoice: ToolChoice | null;
  readonly responseSchema: JsonSchema | null;
  readonly systemPrompt: string | null;
}

/**
 * One response from a model.
 */
export interface ProviderResponse {
  readonly content: ReadonlyArray<ContentBlock>;
  readonly stopReason: StopReason | null;
  readonly usage: TokenUsage;
  readonly model: string;
}

/**
 * Performs one request/response exchange with an LLM vendor.
 *
 * Implementations throw a `ProviderError` for failures they can classify
 * (HTTP status, response headers); anything else is treated as fatal unless
 * it looks like a transport failure.
 */
export interface ProviderRoundTrip {
  readonly name: string;
  execute(request: ProviderRequest): Promise<ProviderResponse>;
}
