/**
 * Format Utilities
 *
 * Small value-level helpers shared by the converters and the loggers.
 *
 * @module translation/utils/formatUtils
 */

import type { JsonValue, ToolDefinition } from '../../types/index.js';

/**
 * Render a tool_result payload as the string content of a native `tool`
 * message. Strings pass through, objects and arrays are JSON-encoded and
 * anything else uses its display string.
 */
export function stringifyToolResultContent(content: JsonValue): string {
  if (typeof content === 'string') {
    return content;
  }
  if (content !== null && typeof content === 'object') {
    return JSON.stringify(content);
  }
  return String(content);
}

/**
 * Check if a request declares at least one tool
 */
export function hasTools(tools: readonly ToolDefinition[] | undefined): tools is readonly ToolDefinition[] {
  return Array.isArray(tools) && tools.length > 0;
}

/**
 * Shorten text for a log line. Text under `threshold` characters is cut to
 * `shortLimit`; longer text is cut to `longLimit` and marked with "...".
 */
export function truncateForLog(
  text: string,
  threshold: number,
  shortLimit: number,
  longLimit: number,
): string {
  if (text.length < threshold) {
    return text.slice(0, shortLimit);
  }
  return `${text.slice(0, longLimit)}...`;
}
