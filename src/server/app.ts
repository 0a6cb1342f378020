import express, { type NextFunction, type Request, type Response } from "express";

import { MESSAGES_ENDPOINTS } from "../constants/endpoints.js";
import { createMessagesHandler } from "../handlers/messagesHandler.js";
import { createStatusHandler, healthHandler } from "../handlers/statusHandler.js";
import { logger } from "../logging/index.js";
import { BackendServiceImpl, TranslationServiceImpl } from "../services/index.js";
import { isInteger, isRecord } from "../translation/utils/typeGuards.js";
import { sendClientError, sendNotFound, sendProxyError } from "../utils/http/index.js";

import type { ProxyConfig } from "../config.js";
import type { BackendService, TranslationService } from "../services/index.js";
import type { Express } from "express";

export interface AppOptions {
  config: ProxyConfig;
  /** Replaces the default service; tests pass fakes here */
  translationService?: TranslationService;
  backendService?: BackendService;
}

/**
 * 4xx status of a body-parser failure (malformed JSON, oversized body)
 */
function clientErrorStatus(error: unknown): number | null {
  if (!isRecord(error)) {
    return null;
  }
  const status = error["status"] ?? error["statusCode"];
  return isInteger(status) && status >= 400 && status < 500 ? status : null;
}

export function createApp(options: AppOptions): Express {
  const { config } = options;
  const translationService = options.translationService ?? new TranslationServiceImpl(config);
  const backendService = options.backendService ?? new BackendServiceImpl(config);

  const app = express();

  app.get(MESSAGES_ENDPOINTS.ROOT, createStatusHandler(config));
  app.get(MESSAGES_ENDPOINTS.HEALTH, healthHandler);

  app.post(
    MESSAGES_ENDPOINTS.MESSAGES,
    express.json({ limit: "50mb" }),
    createMessagesHandler({ config, translationService, backendService }),
  );

  // 404 handler - Express 5 compatible
  app.use((req: Request, res: Response) => {
    sendNotFound(res, req.originalUrl);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== null) {
      const message = error instanceof Error ? error.message : "Invalid request body";
      sendClientError(res, status, message, "REQUEST BODY");
      return;
    }
    logger.error(`[SERVER] Unhandled error on ${req.method} ${req.originalUrl}`);
    sendProxyError(res, error, config.backend.providerName);
  });

  return app;
}
