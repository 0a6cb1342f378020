/**
 * Translation errors
 *
 * Every failure to map a payload between the two formats is a
 * TranslationError. Handlers turn them into a single error response.
 */

export class TranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranslationError';
  }
}

/**
 * A native tool call whose `arguments` string is not a JSON object.
 */
export class MalformedToolArgumentsError extends TranslationError {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly rawArguments: string;

  constructor(toolCallId: string, toolName: string, rawArguments: string, reason: string) {
    super(`Malformed arguments for tool call ${toolCallId} (${toolName}): ${reason}`);
    this.name = 'MalformedToolArgumentsError';
    this.toolCallId = toolCallId;
    this.toolName = toolName;
    this.rawArguments = rawArguments;
  }
}

/**
 * A backend completion that does not have the Chat Completions shape.
 */
export class MalformedCompletionError extends TranslationError {
  constructor(reason: string) {
    super(`Malformed completion from backend: ${reason}`);
    this.name = 'MalformedCompletionError';
  }
}
