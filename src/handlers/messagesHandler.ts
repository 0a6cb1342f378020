import { logModelMapping, logPayload, logRequest, logResponse, logger } from "../logging/index.js";
import { validateMessagesRequest } from "../translation/validation/messagesRequestValidator.js";
import { sendProxyError, sendValidationError } from "../utils/http/index.js";

import type { ProxyConfig } from "../config.js";
import type { BackendService, TranslationService } from "../services/index.js";
import type { Request, Response } from "express";

const ROUTE_NAME = "MESSAGES";

export interface MessagesHandlerDeps {
  config: ProxyConfig;
  translationService: TranslationService;
  backendService: BackendService;
}

/**
 * POST /v1/messages - thin HTTP adapter
 *
 * validate → translate request → one backend call → translate response.
 * All business logic is delegated to services.
 */
export function createMessagesHandler(
  deps: MessagesHandlerDeps,
): (req: Request, res: Response) => Promise<void> {
  const { config, translationService, backendService } = deps;

  return async function messagesHandler(req: Request, res: Response): Promise<void> {
    const startedAt = Date.now();
    logRequest(req, ROUTE_NAME);
    logPayload("[CLIENT REQUEST] Body:", req.body);

    const validation = validateMessagesRequest(req.body);
    if (!validation.valid) {
      sendValidationError(res, validation.errors.join("; "), ROUTE_NAME);
      logResponse(res.statusCode, ROUTE_NAME, Date.now() - startedAt);
      return;
    }

    const request = validation.value;
    logModelMapping(config.backend.providerName, request.model, config.backend.modelName);
    if (request.stream) {
      logger.debug("[MESSAGES] stream=true requested; answering with a complete response");
    }

    try {
      const payload = translationService.translateRequest(request);
      const completion = await backendService.sendChatCompletion(payload);
      const response = translationService.translateResponse(completion);
      res.json(response);
    } catch (error: unknown) {
      sendProxyError(res, error, config.backend.providerName);
    }

    logResponse(res.statusCode, ROUTE_NAME, Date.now() - startedAt);
  };
}
