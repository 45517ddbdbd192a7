/**
 * Configuration loader for the sustainability actions server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, PartialAppConfig } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for ${VAR} substitution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Turn a substituted `server.port` such as "3001" back into a number.
 */
function coercePort(config: unknown): unknown {
  if (!isObject(config) || !isObject(config.server)) {
    return config;
  }
  const port = config.server.port;
  if (typeof port === 'string' && /^\s*\d+\s*$/.test(port)) {
    return { ...config, server: { ...config.server, port: Number(port) } };
  }
  return config;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): void {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.port !== undefined && (typeof c.port !== 'number' || !Number.isInteger(c.port) || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !LOG_LEVELS.some(level => level === c.logLevel)) {
    throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, c.logLevel);
  }

  if (c.cors !== undefined) {
    if (!isObject(c.cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, c.cors);
    }
    const cors = c.cors;
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    if (
      cors.origins !== undefined &&
      (!Array.isArray(cors.origins) || !cors.origins.every(origin => typeof origin === 'string'))
    ) {
      throw new ConfigValidationError('origins must be an array of strings', `${path}.cors.origins`, cors.origins);
    }
  }
}

/**
 * Validate store configuration.
 */
function validateStoreConfig(config: unknown, path = 'store'): void {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.dataFile !== undefined && (typeof c.dataFile !== 'string' || c.dataFile.trim() === '')) {
    throw new ConfigValidationError('dataFile must be a non-empty string', `${path}.dataFile`, c.dataFile);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isObject(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.store !== undefined) {
    validateStoreConfig(config.store);
  }
}

/**
 * Merge a partial config over the defaults.
 */
export function mergeWithDefaults(partial: PartialAppConfig): AppConfig {
  const server = partial.server ?? {};
  const store = partial.store ?? {};
  return {
    server: {
      port: server.port ?? DEFAULT_CONFIG.server.port,
      host: server.host ?? DEFAULT_CONFIG.server.host,
      logLevel: server.logLevel ?? DEFAULT_CONFIG.server.logLevel,
      cors: {
        enabled: server.cors?.enabled ?? DEFAULT_CONFIG.server.cors.enabled,
        origins: server.cors?.origins ?? [...DEFAULT_CONFIG.server.cors.origins],
      },
    },
    store: {
      dataFile: store.dataFile ?? DEFAULT_CONFIG.store.dataFile,
    },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return mergeWithDefaults({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return mergeWithDefaults({});
  }

  // Substitute environment variables
  const substituted = coercePort(substituteEnvVarsRecursive(parsed, options.env ?? process.env));

  validateConfig(substituted);
  return mergeWithDefaults(substituted);
}
