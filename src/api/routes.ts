/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the ActionService.
 */

import type { FastifyInstance } from 'fastify';
import type { ActionHandlers } from './handlers/ActionHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  actionHandlers: ActionHandlers;
  /** Number of stored records, reported by the health check */
  recordCount: () => Promise<number>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { actionHandlers, recordCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (request): Promise<HealthResponse> => {
    try {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        components: { store: { records: await recordCount() } },
      };
    } catch (err) {
      request.log.warn({ err }, 'Health check could not read the store');
      return {
        status: 'degraded',
        timestamp: new Date().toISOString(),
        components: {
          store: { records: 0, error: err instanceof Error ? err.message : String(err) },
        },
      };
    }
  });

  // ============================================================================
  // Action Routes
  // ============================================================================

  // List actions
  fastify.get('/actions/', actionHandlers.listActions);

  // Create action
  fastify.post('/actions/', actionHandlers.createAction);

  // Get single action
  fastify.get('/actions/:id/', actionHandlers.getAction);

  // Replace action
  fastify.put('/actions/:id/', actionHandlers.replaceAction);

  // Partially update action
  fastify.patch('/actions/:id/', actionHandlers.patchAction);

  // Delete action
  fastify.delete('/actions/:id/', actionHandlers.deleteAction);
}
