/**
 * Type exports
 */

export type * from './messages.js';
export type * from './openai.js';
export type * from './proxy.js';
