/**
 * Error Response Handler
 *
 * Every error a client sees leaves through here, in the Messages error
 * envelope `{ type: "error", error: { type, message } }`.
 */

import { logger } from "../../logging/index.js";
import { BackendError } from "../../services/errors.js";
import { TranslationError } from "../../translation/errors.js";
import { isRecord } from "../../translation/utils/typeGuards.js";

import type { MessagesErrorResponse, MessagesErrorType } from "../../types/index.js";
import type { Response } from "express";

export function createErrorPayload(type: MessagesErrorType, message: string): MessagesErrorResponse {
  return {
    type: "error",
    error: { type, message },
  };
}

/**
 * Extracts error message from unknown error type
 *
 * Handles various error formats:
 * - Error instances (message property)
 * - String errors
 * - Objects with message/error properties
 * - null/undefined
 * - Prevents '[object Object]' output
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error (empty response)';
  }

  if (error instanceof Error) {
    return error.message || 'Unknown error';
  }

  if (typeof error === 'string') {
    return error.trim() || 'Unknown error (empty string)';
  }

  if (typeof error === 'object') {
    if (isRecord(error)) {
      const messageVal = error['message'];
      if (typeof messageVal === 'string' && messageVal.trim()) {
        return messageVal.trim();
      }

      // Common in API responses: { error: '...' } or { error: { message: '...' } }
      const errorProp = error['error'];
      if (typeof errorProp === 'string' && errorProp.trim()) {
        return errorProp.trim();
      }
      if (isRecord(errorProp)) {
        const nestedMessage = errorProp['message'];
        if (typeof nestedMessage === 'string' && nestedMessage.trim()) {
          return nestedMessage.trim();
        }
      }
    }

    try {
      const stringified = JSON.stringify(error);
      if (stringified && stringified !== '{}' && stringified !== '[]') {
        return `Error details: ${stringified}`;
      }
    } catch (stringifyError: unknown) {
      logger.debug('[ERROR] Could not serialize error object:', stringifyError);
    }
  }

  return 'Unknown error';
}

/**
 * Sends a 4xx response for a request the proxy cannot accept
 */
export function sendClientError(res: Response, statusCode: number, message: string, context?: string): void {
  if (context) {
    logger.error(`[${context}] Request rejected (${statusCode}): ${message}`);
  }

  res.status(statusCode).json(createErrorPayload('invalid_request_error', message));
}

/**
 * Sends a validation error response (400 Bad Request)
 */
export function sendValidationError(res: Response, message: string, context?: string): void {
  sendClientError(res, 400, message, context);
}

export function sendNotFound(res: Response, url: string): void {
  logger.warn("[PROXY] 404 Not Found:", url);
  res.status(404).json(createErrorPayload('not_found_error', `No route for ${url}`));
}

/**
 * Terminates an exchange that failed in translation or at the backend.
 *
 * The failure is not classified: the client gets a 500 carrying the
 * underlying error text, and nothing of a partial result.
 */
export function sendProxyError(res: Response, error: unknown, providerName: string): void {
  const errorMessage = extractErrorMessage(error);

  if (error instanceof BackendError) {
    logger.error(`[BACKEND ERROR] ${providerName}: ${errorMessage} (backend status ${error.status})`);
  } else if (error instanceof TranslationError) {
    logger.error(`[TRANSLATION ERROR] ${error.name}: ${errorMessage}`);
  } else {
    logger.error(`[PROXY ERROR] ${providerName}:`, error);
  }

  if (res.headersSent) {
    logger.error("[PROXY ERROR] Headers already sent; cannot deliver error response");
    return;
  }

  res.status(500).json(
    createErrorPayload('api_error', `Error calling ${providerName} API: ${errorMessage}`),
  );
}
