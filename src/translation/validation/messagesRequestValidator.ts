/**
 * Messages Request Validator
 *
 * Checks an untrusted `POST /v1/messages` body and builds a typed
 * MessagesRequest with defaults applied. Every problem found is reported,
 * not just the first.
 */

import {
  isBoolean,
  isInteger,
  isJsonObject,
  isJsonValue,
  isMessageRole,
  isNumber,
  isRecord,
  isString,
} from '../utils/typeGuards.js';

import type {
  ContentBlock,
  MessagesRequest,
  StructuredMessage,
  SystemPrompt,
  TextBlock,
  ToolChoice,
  ToolDefinition,
  ValidationResult,
} from '../../types/index.js';

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TOOL_CHOICE: ToolChoice = 'auto';

function validateBlock(value: unknown, path: string, errors: string[]): ContentBlock | null {
  if (!isRecord(value)) {
    errors.push(`${path} must be an object`);
    return null;
  }

  const type = value['type'];
  switch (type) {
    case 'text': {
      const text = value['text'];
      if (!isString(text)) {
        errors.push(`${path}.text must be a string`);
        return null;
      }
      return { type: 'text', text };
    }
    case 'tool_use': {
      const id = value['id'];
      const name = value['name'];
      const input = value['input'];
      if (!isString(id)) {errors.push(`${path}.id must be a string`);}
      if (!isString(name)) {errors.push(`${path}.name must be a string`);}
      if (!isJsonObject(input)) {errors.push(`${path}.input must be a JSON object`);}
      if (!isString(id) || !isString(name) || !isJsonObject(input)) {
        return null;
      }
      return { type: 'tool_use', id, name, input };
    }
    case 'tool_result': {
      const toolUseId = value['tool_use_id'];
      const content = value['content'] ?? '';
      if (!isString(toolUseId)) {
        errors.push(`${path}.tool_use_id must be a string`);
        return null;
      }
      if (!isJsonValue(content)) {
        errors.push(`${path}.content must be JSON-compatible`);
        return null;
      }
      return { type: 'tool_result', tool_use_id: toolUseId, content };
    }
    default:
      errors.push(
        isString(type)
          ? `${path}.type "${type}" is not supported`
          : `${path}.type must be one of text, tool_use, tool_result`,
      );
      return null;
  }
}

function validateMessage(value: unknown, path: string, errors: string[]): StructuredMessage | null {
  if (!isRecord(value)) {
    errors.push(`${path} must be an object`);
    return null;
  }

  const role = value['role'];
  const content = value['content'];
  if (!isMessageRole(role)) {
    errors.push(`${path}.role must be "user" or "assistant"`);
  }

  if (isString(content)) {
    return isMessageRole(role) ? { role, content } : null;
  }
  if (!Array.isArray(content)) {
    errors.push(`${path}.content must be a string or an array of content blocks`);
    return null;
  }

  const blocks: ContentBlock[] = [];
  content.forEach((block: unknown, index: number) => {
    const validated = validateBlock(block, `${path}.content[${index}]`, errors);
    if (validated !== null) {
      blocks.push(validated);
    }
  });

  return isMessageRole(role) ? { role, content: blocks } : null;
}

function validateTool(value: unknown, path: string, errors: string[]): ToolDefinition | null {
  if (!isRecord(value)) {
    errors.push(`${path} must be an object`);
    return null;
  }

  const name = value['name'];
  const description = value['description'];
  const inputSchema = value['input_schema'];
  const before = errors.length;

  if (!isString(name) || name === '') {errors.push(`${path}.name must be a non-empty string`);}
  if (description !== undefined && description !== null && !isString(description)) {
    errors.push(`${path}.description must be a string`);
  }
  if (!isJsonObject(inputSchema)) {errors.push(`${path}.input_schema must be a JSON object`);}

  if (errors.length > before || !isString(name) || !isJsonObject(inputSchema)) {
    return null;
  }
  return {
    name,
    description: isString(description) ? description : null,
    input_schema: inputSchema,
  };
}

function validateSystem(value: unknown, errors: string[]): SystemPrompt | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (isString(value)) {
    return value;
  }
  if (!Array.isArray(value)) {
    errors.push('system must be a string or an array of text blocks');
    return undefined;
  }

  const blocks: TextBlock[] = [];
  value.forEach((block: unknown, index: number) => {
    const text = isRecord(block) && block['type'] === 'text' ? block['text'] : undefined;
    if (isString(text)) {
      blocks.push({ type: 'text', text });
    } else {
      errors.push(`system[${index}] must be a text block`);
    }
  });
  return blocks;
}

export function validateMessagesRequest(body: unknown): ValidationResult<MessagesRequest> {
  if (!isRecord(body)) {
    return { valid: false, errors: ['Request body must be a JSON object'] };
  }

  const errors: string[] = [];

  const model = body['model'];
  if (!isString(model) || model === '') {
    errors.push('model must be a non-empty string');
  }

  const rawMessages = body['messages'];
  const messages: StructuredMessage[] = [];
  if (!Array.isArray(rawMessages)) {
    errors.push('messages must be an array');
  } else if (rawMessages.length === 0) {
    errors.push('messages must contain at least one message');
  } else {
    rawMessages.forEach((message: unknown, index: number) => {
      const validated = validateMessage(message, `messages[${index}]`, errors);
      if (validated !== null) {
        messages.push(validated);
      }
    });
  }

  const rawMaxTokens = body['max_tokens'];
  let maxTokens: number | null = DEFAULT_MAX_TOKENS;
  if (rawMaxTokens === null) {
    maxTokens = null;
  } else if (rawMaxTokens !== undefined) {
    if (isInteger(rawMaxTokens) && rawMaxTokens >= 0) {
      maxTokens = rawMaxTokens;
    } else {
      errors.push('max_tokens must be a non-negative integer');
    }
  }

  const rawTemperature = body['temperature'];
  let temperature = DEFAULT_TEMPERATURE;
  if (rawTemperature !== undefined && rawTemperature !== null) {
    if (isNumber(rawTemperature)) {
      temperature = rawTemperature;
    } else {
      errors.push('temperature must be a number');
    }
  }

  const rawTools = body['tools'];
  let tools: ToolDefinition[] | undefined;
  if (rawTools !== undefined && rawTools !== null) {
    if (Array.isArray(rawTools)) {
      const validTools: ToolDefinition[] = [];
      rawTools.forEach((tool: unknown, index: number) => {
        const validated = validateTool(tool, `tools[${index}]`, errors);
        if (validated !== null) {
          validTools.push(validated);
        }
      });
      tools = validTools;
    } else {
      errors.push('tools must be an array');
    }
  }

  const rawToolChoice = body['tool_choice'];
  let toolChoice: ToolChoice = DEFAULT_TOOL_CHOICE;
  if (rawToolChoice !== undefined && rawToolChoice !== null) {
    if (isString(rawToolChoice) || isJsonObject(rawToolChoice)) {
      toolChoice = rawToolChoice;
    } else {
      errors.push('tool_choice must be a string or an object');
    }
  }

  const rawStream = body['stream'];
  let stream = false;
  if (rawStream !== undefined && rawStream !== null) {
    if (isBoolean(rawStream)) {
      stream = rawStream;
    } else {
      errors.push('stream must be a boolean');
    }
  }

  const system = validateSystem(body['system'], errors);

  if (errors.length > 0 || !isString(model)) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors: [],
    value: {
      model,
      messages,
      max_tokens: maxTokens,
      temperature,
      tools,
      tool_choice: toolChoice,
      stream,
      system,
    },
  };
}
