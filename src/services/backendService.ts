/**
 * Backend Service Implementation
 *
 * All communication with the Chat Completions provider. One POST per
 * exchange, bounded by the configured timeout, never retried.
 */

import axios, { isAxiosError } from "axios";

import { BACKEND_ENDPOINTS } from "../constants/endpoints.js";
import { logger, logPayload } from "../logging/index.js";
import { isRecord } from "../translation/utils/typeGuards.js";
import { extractErrorMessage } from "../utils/http/errorResponseHandler.js";
import { buildBackendHeaders, maskHeaders } from "../utils/http/headerUtils.js";
import { buildBackendUrl } from "../utils/url/index.js";

import { BackendError } from "./errors.js";

import type { BackendService } from "./contracts.js";
import type { ProxyConfig } from "../config.js";
import type { ChatCompletionRequest } from "../types/index.js";

function stringifyBody(data: unknown): string {
  if (typeof data === "string") {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export class BackendServiceImpl implements BackendService {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;

  constructor(config: ProxyConfig) {
    this.url = buildBackendUrl(config.backend.baseUrl, BACKEND_ENDPOINTS.CHAT_COMPLETIONS);
    this.headers = buildBackendHeaders(config.backend.apiKey);
    this.timeout = config.performance.connectionTimeout;
  }

  private logRequest(payload: ChatCompletionRequest): void {
    logger.debug(`\n[BACKEND REQUEST] Sending request to ${this.url}`);
    logPayload("[BACKEND REQUEST] Headers:", maskHeaders(this.headers));
    logPayload("[BACKEND REQUEST] Payload:", payload);
  }

  private toBackendError(error: unknown): BackendError {
    if (!isAxiosError(error)) {
      return new BackendError(extractErrorMessage(error), 500);
    }

    if (error.response) {
      const status = error.response.status;
      const body = stringifyBody(error.response.data);
      logger.error(`[BACKEND ERROR] Response Status: ${status}`);
      logger.error(`[BACKEND ERROR] Response Body:`, body);
      return new BackendError(
        `Status ${status}: ${extractErrorMessage(error.response.data)}`,
        status,
        body,
      );
    }

    if (error.request) {
      logger.error(
        `[BACKEND ERROR] No response received for request to ${this.url}. Error Code: ${error.code ?? "N/A"}`,
      );
      return new BackendError(
        `No response received from ${this.url} (${error.code ?? error.message})`,
        504,
      );
    }

    return new BackendError(`Request setup failed: ${error.message}`, 500);
  }

  async sendChatCompletion(payload: ChatCompletionRequest): Promise<unknown> {
    this.logRequest(payload);

    let body: unknown;
    try {
      const response = await axios.post<unknown>(this.url, payload, {
        headers: this.headers,
        timeout: this.timeout,
        responseType: "json",
      });
      logger.debug(`[BACKEND RESPONSE] Status: ${response.status}`);
      logPayload("[BACKEND RESPONSE] Body:", response.data);
      body = response.data;
    } catch (error: unknown) {
      throw this.toBackendError(error);
    }

    // Some providers report failures as a 2xx with an error body
    if (isRecord(body) && body["error"] !== undefined && body["error"] !== null) {
      logger.error(`[BACKEND ERROR] Error body in a successful response from ${this.url}`);
      throw new BackendError(extractErrorMessage(body), 502, stringifyBody(body));
    }

    return body;
  }
}
