import chalk from "chalk";

import { isRecord } from "../translation/utils/typeGuards.js";

import logger from "./logger.js";

import type { Request } from "express";

function formatMethod(method: string): string {
  const upperMethod = method.toUpperCase();
  return upperMethod === "POST" ? chalk.yellow(upperMethod) : chalk.green(upperMethod);
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  return chalk.green;
}

const STATUS_TEXT: ReadonlyMap<number, string> = new Map([
  [200, "OK"],
  [400, "Bad Request"],
  [404, "Not Found"],
  [413, "Payload Too Large"],
  [500, "Internal Server Error"],
]);

/**
 * One-line shape of a Messages request body: message count, tool count and
 * whether a stream was asked for. Empty for anything else.
 */
export function summarizeMessagesBody(body: unknown): string {
  const messages: unknown = isRecord(body) ? body["messages"] : undefined;
  if (!isRecord(body) || !Array.isArray(messages)) {
    return "";
  }
  const tools = body["tools"];
  const parts = [
    `messages=${messages.length}`,
    `tools=${Array.isArray(tools) ? tools.length : 0}`,
  ];
  if (body["stream"] === true) {
    parts.push("stream=requested");
  }
  return parts.join(" ");
}

export function logRequest(req: Request, routeName: string): void {
  const timestamp = new Date().toISOString();
  const method = formatMethod(req.method);
  const endpoint = chalk.cyan(req.originalUrl);

  logger.info(`${chalk.blue("➤")} ${chalk.dim(timestamp)} ${method} ${endpoint} ${chalk.yellow(routeName)}`);

  const summary = summarizeMessagesBody(req.body);
  if (summary !== "") {
    logger.info(`  ${chalk.dim(summary)}`);
  }
}

export function logResponse(status: number, routeName: string, durationMs: number): void {
  const statusColor = getStatusColor(status);
  const label = STATUS_TEXT.get(status);
  const statusText = statusColor(label === undefined ? String(status) : `${status} ${label}`);

  logger.info(
    `${chalk.blue("⮑")} ${statusText} ${chalk.yellow(routeName)} ${chalk.dim("in")} ${chalk.magenta(`${durationMs}ms`)}`,
  );
}
