/**
 * Completion Result Reader
 *
 * Reads the first choice of a raw Chat Completions response body into a
 * NativeCompletionResult. The body comes off the wire, so every field is
 * checked before use.
 */

import { MalformedCompletionError } from '../errors.js';
import { isInteger, isRecord, isString } from '../utils/typeGuards.js';

import type { FinishReason, NativeCompletionResult, NativeToolCall } from '../../types/index.js';

const FINISH_REASONS: ReadonlyMap<string, FinishReason> = new Map<string, FinishReason>([
  ['stop', 'stop'],
  ['length', 'length'],
  ['tool_calls', 'tool_calls'],
]);

export function normalizeFinishReason(value: unknown): FinishReason {
  return (isString(value) ? FINISH_REASONS.get(value) : undefined) ?? 'other';
}

function readToolCall(value: unknown, index: number): NativeToolCall {
  if (!isRecord(value)) {
    throw new MalformedCompletionError(`tool_calls[${index}] is not an object`);
  }
  const id = value['id'];
  const fn = value['function'];
  if (!isString(id) || !isRecord(fn)) {
    throw new MalformedCompletionError(`tool_calls[${index}] is missing id or function`);
  }
  const name = fn['name'];
  const args = fn['arguments'];
  if (!isString(name)) {
    throw new MalformedCompletionError(`tool_calls[${index}].function.name must be a string`);
  }
  if (!isString(args)) {
    throw new MalformedCompletionError(`tool_calls[${index}].function.arguments must be a string`);
  }

  return {
    id,
    type: 'function',
    function: { name, arguments: args },
  };
}

function readTokenCount(usage: unknown, key: string): number {
  if (!isRecord(usage)) {
    return 0;
  }
  const count = usage[key];
  return isInteger(count) ? count : 0;
}

export function toCompletionResult(body: unknown): NativeCompletionResult {
  if (!isRecord(body)) {
    throw new MalformedCompletionError('response body is not an object');
  }

  const choices = body['choices'];
  if (!Array.isArray(choices) || choices.length === 0) {
    throw new MalformedCompletionError('response has no choices');
  }

  const choice: unknown = choices[0];
  const message: unknown = isRecord(choice) ? choice['message'] : undefined;
  if (!isRecord(choice) || !isRecord(message)) {
    throw new MalformedCompletionError('first choice has no message');
  }

  const content = message['content'];
  let text: string | null = null;
  if (isString(content)) {
    text = content;
  } else if (content !== undefined && content !== null) {
    throw new MalformedCompletionError('message content must be a string or null');
  }

  const rawToolCalls = message['tool_calls'];
  let toolCalls: NativeToolCall[] = [];
  if (Array.isArray(rawToolCalls)) {
    toolCalls = rawToolCalls.map((call: unknown, index: number) => readToolCall(call, index));
  } else if (rawToolCalls !== undefined && rawToolCalls !== null) {
    throw new MalformedCompletionError('message tool_calls must be an array');
  }

  return {
    text,
    toolCalls,
    finishReason: normalizeFinishReason(choice['finish_reason']),
    usage: {
      promptTokens: readTokenCount(body['usage'], 'prompt_tokens'),
      completionTokens: readTokenCount(body['usage'], 'completion_tokens'),
    },
  };
}
