/**
 * Configuration types for the sustainability actions server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

/**
 * Log levels accepted by the server logger.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Top-level application configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  store: StoreConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Record store settings.
 */
export interface StoreConfig {
  /** Collection file, relative to the base path unless absolute (default: 'actions_data.json') */
  dataFile: string;
}

/**
 * Deeply optional view of AppConfig, as read from a config file.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  store?: Partial<StoreConfig>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  store: {
    dataFile: 'actions_data.json',
  },
};
