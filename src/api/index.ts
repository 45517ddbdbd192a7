/**
 * HTTP API exports.
 */

export { registerRoutes } from './routes.js';
export type { RouteOptions } from './routes.js';
export { createActionHandlers, parseActionId } from './handlers/index.js';
export type { ActionHandlers } from './handlers/index.js';
export type {
  ApiError,
  ValidationErrorResponse,
  ActionParams,
  HealthResponse,
  ServerConfig,
} from './types.js';
