/**
 * Chat Completions API Types
 *
 * The provider-native side of the bridge: flat messages, function tools and
 * JSON-string tool arguments.
 */

import type { JsonObject, ToolChoice } from './messages.js';

export interface NativeToolCall {
  readonly id: string;
  readonly type: 'function';
  readonly function: {
    readonly name: string;
    readonly arguments: string; // JSON string
  };
}

export interface NativeTextMessage {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
}

export interface NativeToolCallMessage {
  readonly role: 'assistant';
  readonly content: string | null;
  readonly tool_calls: readonly NativeToolCall[];
}

export interface NativeToolResultMessage {
  readonly role: 'tool';
  readonly tool_call_id: string;
  readonly content: string;
}

export type NativeMessage =
  | NativeTextMessage
  | NativeToolCallMessage
  | NativeToolResultMessage;

export interface NativeToolDefinition {
  readonly type: 'function';
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: JsonObject;
  };
}

export interface ChatCompletionRequest {
  model: string;
  messages: readonly NativeMessage[];
  temperature: number;
  max_tokens: number;
  tools?: readonly NativeToolDefinition[];
  tool_choice?: ToolChoice;
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'other';

export interface CompletionUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
}

/** First choice of a completion, reduced to what the response side needs. */
export interface NativeCompletionResult {
  readonly text?: string | null | undefined;
  readonly toolCalls?: readonly NativeToolCall[] | undefined;
  readonly finishReason: FinishReason;
  readonly usage: CompletionUsage;
}
