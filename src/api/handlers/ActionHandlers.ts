/**
 * ActionHandlers — HTTP handlers for action CRUD operations.
 *
 * These handlers are thin wrappers around ActionService. They translate
 * service results into status codes and JSON bodies and contain no
 * validation or storage logic of their own.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ActionService } from '../../service/ActionService.js';
import type { ServiceFailure } from '../../service/types.js';
import type { ActionRecord } from '../../types/ActionRecord.js';
import type { ActionParams, ApiError, ValidationErrorResponse } from '../types.js';

const NOT_FOUND_DETAIL = 'Action not found';
const ROUTE_NOT_FOUND_DETAIL = 'Not found.';
const UPDATE_FAILED_DETAIL = 'Failed to update action';

type ItemRequest = FastifyRequest<{ Params: ActionParams }>;
type ItemBodyRequest = FastifyRequest<{ Params: ActionParams; Body: unknown }>;

/**
 * Parse an item id path segment. Only plain decimal integers are ids.
 */
export function parseActionId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Map a failed service result to a status code and body.
 */
function sendFailure(reply: FastifyReply, failure: ServiceFailure): ApiError | ValidationErrorResponse {
  switch (failure.error) {
    case 'NOT_FOUND':
      reply.status(404);
      return { detail: NOT_FOUND_DETAIL };
    case 'VALIDATION_FAILED':
      reply.status(400);
      return failure.errors;
    case 'UPDATE_FAILED':
      reply.status(400);
      return { detail: UPDATE_FAILED_DETAIL };
  }
}

function sendInternalError(
  request: FastifyRequest,
  reply: FastifyReply,
  operation: string,
  err: unknown
): ApiError {
  const message = err instanceof Error ? err.message : String(err);
  request.log.error({ err }, `${operation} failed`);
  reply.status(500);
  return { detail: `${operation} failed: ${message}` };
}

/**
 * Create action handlers bound to an ActionService.
 */
export function createActionHandlers(service: ActionService) {
  return {
    /**
     * GET /actions/
     * List all actions.
     */
    async listActions(
      request: FastifyRequest,
      reply: FastifyReply
    ): Promise<ActionRecord[] | ApiError> {
      try {
        return await service.list();
      } catch (err) {
        return sendInternalError(request, reply, 'List actions', err);
      }
    },

    /**
     * POST /actions/
     * Create a new action.
     */
    async createAction(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ActionRecord | ApiError | ValidationErrorResponse> {
      try {
        const result = await service.create(request.body);
        if (!result.success) {
          return sendFailure(reply, result);
        }

        reply.status(201);
        return result.record;
      } catch (err) {
        return sendInternalError(request, reply, 'Create action', err);
      }
    },

    /**
     * GET /actions/:id/
     * Get a single action by id.
     */
    async getAction(
      request: ItemRequest,
      reply: FastifyReply
    ): Promise<ActionRecord | ApiError | ValidationErrorResponse> {
      const id = parseActionId(request.params.id);
      if (id === null) {
        reply.status(404);
        return { detail: ROUTE_NOT_FOUND_DETAIL };
      }

      try {
        const result = await service.get(id);
        return result.success ? result.record : sendFailure(reply, result);
      } catch (err) {
        return sendInternalError(request, reply, 'Get action', err);
      }
    },

    /**
     * PUT /actions/:id/
     * Replace every field of an action.
     */
    async replaceAction(
      request: ItemBodyRequest,
      reply: FastifyReply
    ): Promise<ActionRecord | ApiError | ValidationErrorResponse> {
      const id = parseActionId(request.params.id);
      if (id === null) {
        reply.status(404);
        return { detail: ROUTE_NOT_FOUND_DETAIL };
      }

      try {
        const result = await service.replace(id, request.body);
        return result.success ? result.record : sendFailure(reply, result);
      } catch (err) {
        return sendInternalError(request, reply, 'Update action', err);
      }
    },

    /**
     * PATCH /actions/:id/
     * Update only the supplied fields of an action.
     */
    async patchAction(
      request: ItemBodyRequest,
      reply: FastifyReply
    ): Promise<ActionRecord | ApiError | ValidationErrorResponse> {
      const id = parseActionId(request.params.id);
      if (id === null) {
        reply.status(404);
        return { detail: ROUTE_NOT_FOUND_DETAIL };
      }

      try {
        const result = await service.patch(id, request.body);
        return result.success ? result.record : sendFailure(reply, result);
      } catch (err) {
        return sendInternalError(request, reply, 'Update action', err);
      }
    },

    /**
     * DELETE /actions/:id/
     * Delete an action. Answers 204 whether or not it existed.
     */
    async deleteAction(
      request: ItemRequest,
      reply: FastifyReply
    ): Promise<ApiError | undefined> {
      const id = parseActionId(request.params.id);
      if (id === null) {
        reply.status(404);
        return { detail: ROUTE_NOT_FOUND_DETAIL };
      }

      try {
        await service.remove(id);
      } catch (err) {
        return sendInternalError(request, reply, 'Delete action', err);
      }

      await reply.status(204).send();
      return undefined;
    },
  };
}

export type ActionHandlers = ReturnType<typeof createActionHandlers>;
