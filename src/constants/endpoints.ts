/**
 * API Endpoint Constants - all route paths in one place
 */

/**
 * Routes served to Messages API clients
 */
export const MESSAGES_ENDPOINTS = {
  /** Structured-message completions */
  MESSAGES: '/v1/messages',

  /** Status document */
  ROOT: '/',

  /** Liveness probe */
  HEALTH: '/health',
} as const;

/**
 * Paths on the Chat Completions backend, relative to its base URL
 */
export const BACKEND_ENDPOINTS = {
  CHAT_COMPLETIONS: '/chat/completions',
} as const;
