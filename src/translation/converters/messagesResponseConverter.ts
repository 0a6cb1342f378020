/**
 * Messages Response Converter
 *
 * Re-assembles a native completion into ordered content blocks with a
 * stop reason and usage counters.
 */

import { randomUUID } from 'crypto';

import { logToolUse } from '../../logging/index.js';
import { MalformedToolArgumentsError } from '../errors.js';
import { isJsonObject } from '../utils/typeGuards.js';

import type {
  JsonObject,
  NativeCompletionResult,
  NativeToolCall,
  ResponseContentBlock,
  StopReason,
  StructuredResponse,
  ToolUseBlock,
} from '../../types/index.js';

export interface ResponseConverterOptions {
  /** Value echoed in the response `model` field */
  modelLabel: string;
  generateId?: () => string;
}

export function generateMessageId(): string {
  return `msg_${randomUUID().replace(/-/g, '').slice(0, 24)}`;
}

/**
 * Parse a tool call's JSON argument string. Anything other than a JSON
 * object is rejected: substituting `{}` would change the call's meaning.
 */
export function parseToolArguments(call: NativeToolCall): JsonObject {
  const raw = call.function.arguments;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : 'invalid JSON';
    throw new MalformedToolArgumentsError(call.id, call.function.name, raw, reason);
  }

  if (!isJsonObject(parsed)) {
    throw new MalformedToolArgumentsError(call.id, call.function.name, raw, 'arguments must be a JSON object');
  }
  return parsed;
}

export function toToolUseBlock(call: NativeToolCall): ToolUseBlock {
  const input = parseToolArguments(call);
  logToolUse(call.function.name, input);
  return {
    type: 'tool_use',
    id: call.id,
    name: call.function.name,
    input,
  };
}

/**
 * Tool calls win over the native finish reason, even a `length` one.
 */
export function deriveStopReason(result: NativeCompletionResult): StopReason {
  if (result.toolCalls !== undefined && result.toolCalls.length > 0) {
    return 'tool_use';
  }
  if (result.finishReason === 'length') {
    return 'max_tokens';
  }
  return 'end_turn';
}

export function buildContentBlocks(result: NativeCompletionResult): ResponseContentBlock[] {
  const content: ResponseContentBlock[] = [];

  if (typeof result.text === 'string' && result.text !== '') {
    content.push({ type: 'text', text: result.text });
  }

  for (const call of result.toolCalls ?? []) {
    content.push(toToolUseBlock(call));
  }

  if (content.length === 0) {
    content.push({ type: 'text', text: '' });
  }

  return content;
}

export class MessagesResponseConverter {
  private readonly modelLabel: string;
  private readonly generateId: () => string;

  constructor(options: ResponseConverterOptions) {
    this.modelLabel = options.modelLabel;
    this.generateId = options.generateId ?? generateMessageId;
  }

  convert(result: NativeCompletionResult): StructuredResponse {
    return {
      id: this.generateId(),
      type: 'message',
      model: this.modelLabel,
      role: 'assistant',
      content: buildContentBlocks(result),
      stop_reason: deriveStopReason(result),
      stop_sequence: null,
      usage: {
        input_tokens: result.usage.promptTokens,
        output_tokens: result.usage.completionTokens,
      },
    };
  }
}
