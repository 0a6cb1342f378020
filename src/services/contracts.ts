/**
 * Service Layer Contracts
 *
 * Defines the interfaces between HTTP handlers and business logic.
 * Handlers depend on these, never on the implementations.
 */

import type {
  ChatCompletionRequest,
  MessagesRequest,
  StructuredResponse,
} from '../types/index.js';

/**
 * Translation service - both directions of the format mapping
 */
export interface TranslationService {
    translateRequest(request: MessagesRequest): ChatCompletionRequest;

    /**
     * @param body - raw Chat Completions response body
     */
    translateResponse(body: unknown): StructuredResponse;
}

/**
 * Backend service - the single non-streaming call to the provider
 */
export interface BackendService {
    /**
     * Resolves with the raw response body; rejects with a BackendError.
     */
    sendChatCompletion(payload: ChatCompletionRequest): Promise<unknown>;
}
