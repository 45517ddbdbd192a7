/**
 * sustainability-actions — CRUD API for sustainability actions backed by a
 * JSON file record store.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Configuration
export { loadConfig, validateConfig, mergeWithDefaults, substituteEnvVars, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './config/types.js';
export type { AppConfig, StoreConfig, CorsConfig, LogLevel, PartialAppConfig } from './config/types.js';

// Validation
export * from './validation/index.js';

// Record store
export * from './store/index.js';

// Record service
export * from './service/index.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer, createAppContext } from './server.js';
export type { AppContext } from './server.js';
