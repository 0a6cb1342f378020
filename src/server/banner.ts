import chalk from "chalk";
import stringWidth from "string-width";

import { MESSAGES_ENDPOINTS } from "../constants/endpoints.js";

import type { ProxyConfig } from "../config.js";

const BOX_WIDTH = 60;

const BOX_CHAR = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  leftT: "├",
  rightT: "┤",
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/**
 * Pad `text` to the inner width of the box, centred. Text wider than the box
 * is left as is.
 */
export function createAlignedLine(text: string, width: number = BOX_WIDTH): string {
  const textWidth = stringWidth(stripAnsi(text));
  const padding = Math.max(0, width - 2 - textWidth);
  const leftPadding = Math.floor(padding / 2);
  const rightPadding = padding - leftPadding;

  return (
    chalk.bold.blue(BOX_CHAR.vertical) +
    " ".repeat(leftPadding) +
    text +
    " ".repeat(rightPadding) +
    chalk.bold.blue(BOX_CHAR.vertical)
  );
}

function border(left: string, right: string, width: number): string {
  return chalk.bold.blue(left + BOX_CHAR.horizontal.repeat(width - 2) + right);
}

function entry(label: string, value: string): string {
  return chalk.yellow("> ") + chalk.cyan(label.padEnd(12)) + chalk.green(value);
}

/**
 * Startup banner lines. Pure so that it can be checked without a server.
 */
export function renderBanner(config: ProxyConfig, port: number, host: string): string[] {
  const width = BOX_WIDTH;
  const baseUrl = `http://${host}:${port}`;

  return [
    border(BOX_CHAR.topLeft, BOX_CHAR.topRight, width),
    createAlignedLine(chalk.bold.green("Messages Bridge") + chalk.dim(" - Messages to Chat Completions"), width),
    border(BOX_CHAR.leftT, BOX_CHAR.rightT, width),
    createAlignedLine(entry("Provider:", config.backend.providerName), width),
    createAlignedLine(entry("Model:", config.backend.modelName), width),
    createAlignedLine(entry("Max tokens:", String(config.backend.maxOutputTokens)), width),
    createAlignedLine(entry("Listening:", baseUrl), width),
    createAlignedLine(entry("Debug:", config.server.debug ? "on" : "off"), width),
    border(BOX_CHAR.leftT, BOX_CHAR.rightT, width),
    createAlignedLine(chalk.magenta("Endpoints:"), width),
    createAlignedLine(chalk.cyan(`POST ${MESSAGES_ENDPOINTS.MESSAGES}`), width),
    createAlignedLine(chalk.cyan(`GET  ${MESSAGES_ENDPOINTS.ROOT} and ${MESSAGES_ENDPOINTS.HEALTH}`), width),
    border(BOX_CHAR.bottomLeft, BOX_CHAR.bottomRight, width),
  ];
}
