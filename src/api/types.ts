/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { FieldErrors } from '../types/common.js';
import type { LogLevel } from '../config/types.js';

// ============================================================================
// Error Responses
// ============================================================================

/**
 * Generic error response (not found, failed update, internal errors).
 */
export interface ApiError {
  /** Human-readable message */
  detail: string;
}

/**
 * Validation error response: messages keyed by field.
 */
export type ValidationErrorResponse = FieldErrors;

// ============================================================================
// Action Endpoints
// ============================================================================

/**
 * Path parameters for item routes. The raw segment is parsed by the handler.
 */
export interface ActionParams {
  id: string;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    store?: { records: number; error?: string };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration options.
 */
export interface ServerConfig {
  /** HTTP port (default: 3001) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Collection file, relative to the base path unless absolute (default: 'actions_data.json') */
  dataFile?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Allowed CORS origins (default: ['*']) */
  corsOrigins?: string[];
  /** Log level (default: 'info') */
  logLevel?: LogLevel;
}
