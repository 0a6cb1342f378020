/**
 * Type Guards - runtime checks for untrusted request and response bodies
 */

import type { JsonObject, JsonValue, MessageRole } from '../../types/index.js';

export type UnknownRecord = Record<string, unknown>;

const MESSAGE_ROLES: ReadonlySet<string> = new Set(['user', 'assistant']);

/**
 * Plain object check (not array, not null)
 */
export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isString = (value: unknown): value is string =>
  typeof value === "string";

export const isNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

export const isInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value);

export const isMessageRole = (value: unknown): value is MessageRole =>
  typeof value === 'string' && MESSAGE_ROLES.has(value);

/**
 * True when `value` survives JSON.stringify/JSON.parse unchanged: finite
 * numbers, strings, booleans, null, and arrays/plain objects of those.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isRecord(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export const isJsonObject = (value: unknown): value is JsonObject =>
  isRecord(value) && isJsonValue(value);
