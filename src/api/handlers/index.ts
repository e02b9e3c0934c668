/**
 * Handler exports for the API layer.
 */

export * from './ReagentHandlers.js';
export * from './metaHandlers.js';
