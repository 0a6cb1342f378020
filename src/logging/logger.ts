import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(DEBUG_MODE);

/**
 * Pretty-print a JSON payload at debug level. Nothing is serialized when
 * debug output is off.
 */
export function logPayload(label: string, payload: unknown): void {
  if (!DEBUG_MODE) {
    return;
  }
  logger.debug(label, JSON.stringify(payload, null, 2));
}

export default logger;
