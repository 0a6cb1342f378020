/**
 * Logging Module
 *
 * Centralized logging for the entire application.
 * All logging MUST go through this module.
 */

export { default as logger, logPayload } from './logger.js';
export { logRequest, logResponse } from './requestLogger.js';
export {
  logDroppedBlocks,
  logModelMapping,
  logTokenCap,
  logToolResult,
  logToolUse,
  logUsage,
} from './translationLogger.js';
