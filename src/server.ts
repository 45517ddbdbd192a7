/**
 * Server entry point for the sustainability actions API.
 *
 * This module:
 * - Initializes all components (config, store, validator, service)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { resolve, isAbsolute } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createJsonFileActionStore } from './store/JsonFileActionStore.js';
import type { ActionStore } from './store/types.js';
import { ActionValidator, createValidator } from './validation/ActionValidator.js';
import { ActionService, createActionService } from './service/ActionService.js';
import { createActionHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ApiError, ServerConfig } from './api/types.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  store: ActionStore;
  validator: ActionValidator;
  service: ActionService;
  configPath?: string | undefined;
  dataFile?: string | undefined;
}

/**
 * Apply programmatic overrides on top of the file configuration.
 */
function applyOverrides(appConfig: AppConfig, config: ServerConfig): AppConfig {
  return {
    server: {
      port: config.port ?? appConfig.server.port,
      host: config.host ?? appConfig.server.host,
      logLevel: config.logLevel ?? appConfig.server.logLevel,
      cors: {
        enabled: config.cors ?? appConfig.server.cors.enabled,
        origins: config.corsOrigins ?? appConfig.server.cors.origins,
      },
    },
    store: {
      dataFile: config.dataFile ?? appConfig.store.dataFile,
    },
  };
}

/**
 * Build an application context around an existing store. The validator
 * and service are constructed here and passed down explicitly.
 */
export function createAppContext(
  store: ActionStore,
  appConfig: AppConfig,
  extras: Pick<AppContext, 'configPath' | 'dataFile'> = {}
): AppContext {
  const validator = createValidator();
  const service = createActionService(store, validator);
  return {
    config: appConfig,
    store,
    validator,
    service,
    configPath: extras.configPath,
    dataFile: extras.dataFile,
  };
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  config: ServerConfig = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = process.env.CONFIG_PATH || resolve(basePath, 'config.yaml');
  const appConfig = applyOverrides(await loadConfig({ configPath }), config);

  const dataFile = isAbsolute(appConfig.store.dataFile)
    ? appConfig.store.dataFile
    : resolve(basePath, appConfig.store.dataFile);

  // Initialize record store (creates the collection file on first run)
  const store = createJsonFileActionStore({ filePath: dataFile });
  await store.initialize();
  console.log(`Using collection file: ${dataFile}`);

  console.log('App initialized');

  return createAppContext(store, appConfig, { configPath, dataFile });
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  config: ServerConfig = {}
): Promise<FastifyInstance> {
  const opts = applyOverrides(ctx.config, config);

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: opts.server.logLevel,
    },
    ignoreTrailingSlash: true,
  });

  // Register CORS if enabled
  if (opts.server.cors.enabled) {
    const origins = opts.server.cors.origins;
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  // Client errors (malformed JSON, bad content type) keep their status;
  // anything else is a 500.
  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
      const body: ApiError = { detail: 'Internal server error' };
      return reply.status(500).send(body);
    }
    const body: ApiError = { detail: error.message };
    return reply.status(statusCode).send(body);
  });

  fastify.setNotFoundHandler((_request, reply) => {
    const body: ApiError = { detail: 'Not found.' };
    return reply.status(404).send(body);
  });

  // Create handlers
  const actionHandlers = createActionHandlers(ctx.service);

  registerRoutes(fastify, {
    actionHandlers,
    recordCount: async () => (await ctx.store.getAll()).length,
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  config: ServerConfig = {}
): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath, config);

    // Create server
    const fastify = await createServer(ctx, config);

    // Start listening
    const { port, host } = ctx.config.server;
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

    // Handle shutdown
    const shutdown = (signal: string) => {
      console.log(`\nReceived ${signal}, shutting down...`);
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Error during shutdown:', err);
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main(): Promise<void> {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const config: ServerConfig = {};

  if (process.env.PORT) {
    const port = parseInt(process.env.PORT, 10);
    if (!Number.isNaN(port)) {
      config.port = port;
    }
  }
  if (process.env.HOST) {
    config.host = process.env.HOST;
  }

  await startServer(basePath, config);
}

// Run if executed directly (ESM has no require.main)
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
