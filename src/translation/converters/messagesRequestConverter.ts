/**
 * Messages Request Converter
 *
 * Converts a structured-message request into the Chat Completions shape:
 * content blocks are flattened into native messages, tool definitions become
 * function tools and the token budget is capped at the deployment ceiling.
 */

import { logDroppedBlocks, logTokenCap, logToolResult } from '../../logging/index.js';
import { TranslationError } from '../errors.js';
import { hasTools, stringifyToolResultContent } from '../utils/formatUtils.js';

import type {
  ContentBlock,
  ConvertedRequest,
  MessageRole,
  NativeMessage,
  NativeToolCall,
  NativeToolDefinition,
  NativeToolResultMessage,
  StructuredMessage,
  ToolDefinition,
} from '../../types/index.js';

/**
 * One pass over a message's blocks, in encounter order. Built once, then
 * consumed once by emitMessages.
 */
export interface BlockPartition {
  readonly textParts: readonly string[];
  readonly toolCalls: readonly NativeToolCall[];
  readonly toolResults: readonly NativeToolResultMessage[];
}

export interface TokenBudget {
  readonly maxTokens: number;
  readonly wasCapped: boolean;
}

function assertNever(block: never): never {
  throw new TranslationError(`Unsupported content block: ${JSON.stringify(block)}`);
}

export function partitionBlocks(blocks: readonly ContentBlock[]): BlockPartition {
  const textParts: string[] = [];
  const toolCalls: NativeToolCall[] = [];
  const toolResults: NativeToolResultMessage[] = [];

  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        textParts.push(block.text);
        break;
      case 'tool_use':
        toolCalls.push({
          id: block.id,
          type: 'function',
          function: {
            name: block.name,
            arguments: JSON.stringify(block.input),
          },
        });
        break;
      case 'tool_result': {
        toolResults.push({
          role: 'tool',
          tool_call_id: block.tool_use_id,
          content: stringifyToolResultContent(block.content),
        });
        break;
      }
      default:
        return assertNever(block);
    }
  }

  return { textParts, toolCalls, toolResults };
}

/**
 * Pick exactly one native shape for a partitioned message.
 *
 * Priority: assistant tool calls, then tool results, then plain text. Blocks
 * that do not belong to the winning shape are dropped.
 */
export function emitMessages(role: MessageRole, partition: BlockPartition): NativeMessage[] {
  const { textParts, toolCalls, toolResults } = partition;

  if (toolCalls.length > 0 && role === 'assistant') {
    if (toolResults.length > 0) {
      logDroppedBlocks('tool_result', toolResults.length, role);
    }
    return [{
      role: 'assistant',
      content: textParts.length > 0 ? textParts.join('\n') : null,
      tool_calls: toolCalls,
    }];
  }

  if (toolResults.length > 0) {
    if (textParts.length > 0) {
      logDroppedBlocks('text', textParts.length, role);
    }
    if (toolCalls.length > 0) {
      logDroppedBlocks('tool_use', toolCalls.length, role);
    }
    for (const result of toolResults) {
      logToolResult(result.tool_call_id, result.content);
    }
    return [...toolResults];
  }

  if (toolCalls.length > 0) {
    logDroppedBlocks('tool_use', toolCalls.length, role);
  }
  return [{ role, content: textParts.join('\n') }];
}

export function convertMessage(message: StructuredMessage): NativeMessage[] {
  if (typeof message.content === 'string') {
    return [{ role: message.role, content: message.content }];
  }
  return emitMessages(message.role, partitionBlocks(message.content));
}

/**
 * Flatten messages, preserving input order. One structured message may
 * expand into several native ones.
 */
export function convertMessages(messages: readonly StructuredMessage[]): NativeMessage[] {
  return messages.flatMap(convertMessage);
}

/**
 * Map tool definitions 1:1 to function tools. No tools yields `null`, so the
 * caller omits both `tools` and `tool_choice`.
 */
export function convertTools(tools: readonly ToolDefinition[] | undefined): NativeToolDefinition[] | null {
  if (!hasTools(tools)) {
    return null;
  }

  return tools.map((tool): NativeToolDefinition => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description ?? '',
      parameters: tool.input_schema,
    },
  }));
}

/**
 * Clamp a requested budget to the ceiling. A missing or zero request means
 * "as much as allowed".
 */
export function capMaxTokens(requested: number | null | undefined, ceiling: number): TokenBudget {
  const budget = requested || ceiling;
  return {
    maxTokens: Math.min(budget, ceiling),
    wasCapped: requested !== null && requested !== undefined && requested > ceiling,
  };
}

export class MessagesRequestConverter {
  private readonly maxOutputTokens: number;

  constructor(maxOutputTokens: number) {
    this.maxOutputTokens = maxOutputTokens;
  }

  convert(
    messages: readonly StructuredMessage[],
    tools?: readonly ToolDefinition[],
    requestedMaxTokens?: number | null,
  ): ConvertedRequest {
    const budget = capMaxTokens(requestedMaxTokens, this.maxOutputTokens);
    if (budget.wasCapped && typeof requestedMaxTokens === 'number') {
      logTokenCap(requestedMaxTokens, this.maxOutputTokens);
    }

    return {
      messages: convertMessages(messages),
      tools: convertTools(tools),
      maxTokens: budget.maxTokens,
      wasCapped: budget.wasCapped,
    };
  }
}
