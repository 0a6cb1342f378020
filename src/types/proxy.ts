/**
 * Bridge Core Types
 */

import type { NativeMessage, NativeToolDefinition } from './openai.js';

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };

export interface ConvertedRequest {
  readonly messages: readonly NativeMessage[];
  readonly tools: readonly NativeToolDefinition[] | null;
  readonly maxTokens: number;
  readonly wasCapped: boolean;
}
