/**
 * Service Layer Exports
 *
 * Central export point for all services. Handlers import from here ONLY.
 */

export { BackendServiceImpl } from './backendService.js';
export { BackendError } from './errors.js';
export { TranslationServiceImpl, type TranslationServiceOptions } from './translationService.js';

export type { BackendService, TranslationService } from './contracts.js';
