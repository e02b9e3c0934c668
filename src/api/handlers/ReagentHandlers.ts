/**
 * ReagentHandlers: HTTP handlers for the preset catalog and the preparation calculator.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ReagentService } from '../../reagent/ReagentService.js';
import { InvalidInputError } from '../../reagent/ReagentCalculator.js';
import { PresetNotFoundError } from '../../reagent/PresetCatalog.js';
import type {
  ApiError,
  InvalidInputResponse,
  ListPresetsResponse,
  PrepareResponse,
  PresetResponse,
} from '../types.js';

function toErrorResponse(err: unknown, reply: FastifyReply): ApiError | InvalidInputResponse {
  if (err instanceof InvalidInputError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message, details: err.toJSON() };
  }
  if (err instanceof PresetNotFoundError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createReagentHandlers(service: ReagentService) {
  return {
    /**
     * GET /reagents/presets
     */
    async listPresets(
      _request: FastifyRequest,
      _reply: FastifyReply,
    ): Promise<ListPresetsResponse> {
      const presets = service.listPresets();
      return { presets, total: presets.length };
    },

    /**
     * GET /reagents/presets/:id
     * The id may also be a URL-encoded formula, e.g. Sr(NO3)2; Fastify has already decoded it.
     */
    async getPreset(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ): Promise<PresetResponse | ApiError> {
      try {
        return { preset: service.getPreset(request.params.id) };
      } catch (err) {
        return toErrorResponse(err, reply);
      }
    },

    /**
     * POST /reagents/prepare
     */
    async prepare(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<PrepareResponse | ApiError> {
      try {
        return service.prepare(request.body);
      } catch (err) {
        if (err instanceof InvalidInputError) {
          request.log.debug({ field: err.field }, 'rejected preparation request');
        }
        return toErrorResponse(err, reply);
      }
    },
  };
}

export type ReagentHandlers = ReturnType<typeof createReagentHandlers>;
