/**
 * labprep: reagent preparation calculator and service.
 *
 * This is the main entry point for the library.
 */

// Reagent preparation
export * from './reagent/index.js';

// Configuration
export { loadConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export * from './config/types.js';

// HTTP API
export * from './api/index.js';

// MCP
export * from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
