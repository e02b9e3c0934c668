/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over ReagentService.
 */

import type { FastifyInstance } from 'fastify';
import type { ReagentHandlers } from './handlers/ReagentHandlers.js';
import type { MetaHandlers } from './handlers/metaHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  reagentHandlers: ReagentHandlers;
  metaHandlers?: MetaHandlers;
  presetCount: () => number;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { reagentHandlers, presetCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    const loaded = presetCount();
    return {
      status: loaded > 0 ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      components: {
        presets: { loaded },
      },
    };
  });

  // ============================================================================
  // Meta Routes (optional - requires metaHandlers)
  // ============================================================================

  const { metaHandlers } = options;

  if (metaHandlers) {
    fastify.get('/meta', metaHandlers.getMeta);
  }

  // ============================================================================
  // Reagent Routes
  // ============================================================================

  // List presets
  fastify.get('/reagents/presets', reagentHandlers.listPresets);

  // Get a preset by id or formula
  fastify.get('/reagents/presets/:id', reagentHandlers.getPreset);

  // Compute a preparation
  fastify.post('/reagents/prepare', reagentHandlers.prepare);
}
