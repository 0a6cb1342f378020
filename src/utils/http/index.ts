/**
 * HTTP Module
 *
 * Backend headers and the error envelope sent to clients.
 */

export { buildBackendHeaders, maskHeaders } from './headerUtils.js';
export {
  createErrorPayload,
  extractErrorMessage,
  sendClientError,
  sendNotFound,
  sendProxyError,
  sendValidationError,
} from './errorResponseHandler.js';
