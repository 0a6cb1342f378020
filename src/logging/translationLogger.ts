/**
 * Translation logging
 *
 * Observability for the translation path. Nothing here may change what the
 * translators return.
 */

import chalk from "chalk";

import { truncateForLog } from "../translation/utils/formatUtils.js";

import logger from "./logger.js";

import type { JsonObject } from "../types/index.js";

export function logModelMapping(providerName: string, requestedModel: string, backendModel: string): void {
  logger.info(
    `${chalk.bold.cyan(`Messages → ${providerName}`)} | ${chalk.bold("Model:")} ${chalk.cyan(requestedModel)} → ${chalk.green(backendModel)}`,
  );
}

export function logToolUse(name: string, input: JsonObject): void {
  const rendered = JSON.stringify(input, null, 2);
  logger.debug(`${chalk.bold.green("Tool")} ${name}`);
  logger.debug(`  ${truncateForLog(rendered, 200, 150, 80)}`);
}

export function logToolResult(toolUseId: string, content: string): void {
  logger.debug(`${chalk.bold.yellow("Result")} ${toolUseId.slice(0, 8)}`);
  logger.debug(`  ${truncateForLog(content, 100, 80, 60)}`);
}

export function logDroppedBlocks(kind: string, count: number, role: string): void {
  logger.debug(`[TRANSLATION] Dropped ${count} ${kind} block(s) from a ${role} message`);
}

export function logTokenCap(requested: number, ceiling: number): void {
  logger.warn(`Capping max_tokens from ${requested} to ${ceiling}`);
}

export function logUsage(providerName: string, inputTokens: number, outputTokens: number): void {
  logger.debug(
    `${chalk.bold.green("✓")} ${providerName.toUpperCase()} HTTP 200 (${inputTokens}→${outputTokens} tokens)`,
  );
}
