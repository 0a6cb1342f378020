/**
 * Messages API Types
 *
 * Wire shapes of the structured-message API served to clients on
 * `POST /v1/messages`. Content is a closed tagged union on `type`.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type MessageRole = 'user' | 'assistant';

export interface TextBlock {
  readonly type: 'text';
  readonly text: string;
}

export interface ToolUseBlock {
  readonly type: 'tool_use';
  readonly id: string;
  readonly name: string;
  readonly input: JsonObject;
}

export interface ToolResultBlock {
  readonly type: 'tool_result';
  readonly tool_use_id: string;
  readonly content: JsonValue;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/** Blocks a response may carry: results only ever flow client → model. */
export type ResponseContentBlock = TextBlock | ToolUseBlock;

export interface StructuredMessage {
  readonly role: MessageRole;
  readonly content: string | readonly ContentBlock[];
}

export interface ToolDefinition {
  readonly name: string;
  readonly description?: string | null | undefined;
  readonly input_schema: JsonObject;
}

export type ToolChoice = string | JsonObject;

export type SystemPrompt = string | readonly TextBlock[];

export interface MessagesRequest {
  readonly model: string;
  readonly messages: readonly StructuredMessage[];
  /** `null` means "use the deployment ceiling". */
  readonly max_tokens: number | null;
  readonly temperature: number;
  readonly tools?: readonly ToolDefinition[] | undefined;
  readonly tool_choice: ToolChoice;
  readonly stream: boolean;
  readonly system?: SystemPrompt | undefined;
}

export type StopReason = 'end_turn' | 'max_tokens' | 'tool_use';

export interface MessagesUsage {
  readonly input_tokens: number;
  readonly output_tokens: number;
}

export interface StructuredResponse {
  readonly id: string;
  readonly type: 'message';
  readonly model: string;
  readonly role: 'assistant';
  readonly content: readonly ResponseContentBlock[];
  readonly stop_reason: StopReason;
  readonly stop_sequence: null;
  readonly usage: MessagesUsage;
}

export type MessagesErrorType =
  | 'invalid_request_error'
  | 'not_found_error'
  | 'api_error';

export interface MessagesErrorResponse {
  type: 'error';
  error: {
    type: MessagesErrorType;
    message: string;
  };
}
