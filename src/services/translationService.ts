/**
 * Translation Service Implementation
 *
 * SSOT for both directions of the Messages ⇄ Chat Completions mapping.
 * Handlers MUST go through this service; direct converter imports in
 * handlers are FORBIDDEN.
 */

import { logUsage } from '../logging/index.js';
import { toCompletionResult } from '../translation/converters/completionResult.js';
import { MessagesRequestConverter } from '../translation/converters/messagesRequestConverter.js';
import { MessagesResponseConverter } from '../translation/converters/messagesResponseConverter.js';

import type { TranslationService } from './contracts.js';
import type { ProxyConfig } from '../config.js';
import type {
  ChatCompletionRequest,
  MessagesRequest,
  NativeMessage,
  StructuredResponse,
  SystemPrompt,
} from '../types/index.js';

export interface TranslationServiceOptions {
  /** Override the response id generator (tests) */
  generateId?: () => string;
}

function systemMessage(system: SystemPrompt | undefined): NativeMessage[] {
  if (system === undefined) {
    return [];
  }
  const content = typeof system === 'string'
    ? system
    : system.map((block) => block.text).join('\n');
  return content === '' ? [] : [{ role: 'system', content }];
}

export class TranslationServiceImpl implements TranslationService {
  private readonly modelName: string;
  private readonly providerName: string;
  private readonly requestConverter: MessagesRequestConverter;
  private readonly responseConverter: MessagesResponseConverter;

  constructor(config: ProxyConfig, options: TranslationServiceOptions = {}) {
    this.modelName = config.backend.modelName;
    this.providerName = config.backend.providerName;
    this.requestConverter = new MessagesRequestConverter(config.backend.maxOutputTokens);
    this.responseConverter = new MessagesResponseConverter({
      modelLabel: `${config.backend.providerName}/${config.backend.modelName}`,
      ...(options.generateId ? { generateId: options.generateId } : {}),
    });
  }

  translateRequest(request: MessagesRequest): ChatCompletionRequest {
    const converted = this.requestConverter.convert(
      request.messages,
      request.tools,
      request.max_tokens,
    );

    const payload: ChatCompletionRequest = {
      model: this.modelName,
      messages: [...systemMessage(request.system), ...converted.messages],
      temperature: request.temperature,
      max_tokens: converted.maxTokens,
    };

    if (converted.tools !== null) {
      payload.tools = converted.tools;
      payload.tool_choice = request.tool_choice;
    }

    return payload;
  }

  translateResponse(body: unknown): StructuredResponse {
    const result = toCompletionResult(body);
    const response = this.responseConverter.convert(result);
    logUsage(this.providerName, response.usage.input_tokens, response.usage.output_tokens);
    return response;
  }
}
