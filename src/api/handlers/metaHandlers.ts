/**
 * Meta handlers for server information.
 *
 * Provides endpoints:
 * - GET /meta - Server metadata and calculator defaults
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { PresetCatalog } from '../../reagent/PresetCatalog.js';
import type { ReagentConfig } from '../../config/types.js';

/**
 * Server version (loaded from package.json in real app).
 */
const SERVER_VERSION = '0.1.0';

/**
 * Server start time for uptime calculation.
 */
const startTime = Date.now();

/**
 * Format uptime in human-readable format.
 */
export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Context for meta handlers.
 */
export interface MetaContext {
  presets: PresetCatalog;
  /** Absolute path the catalog was loaded from */
  presetsPath: string;
  reagentConfig: ReagentConfig;
}

/**
 * Meta response structure.
 */
export interface ServerMetaResponse {
  server: {
    version: string;
    uptime: string;
    uptimeMs: number;
  };
  presets: {
    path: string;
    count: number;
  };
  defaults: {
    volumeMl: number;
    concentrationMolar: number;
    displayPrecision: number;
  };
}

/**
 * Create meta handlers.
 */
export function createMetaHandlers(ctx: MetaContext) {
  /**
   * GET /meta - Server metadata.
   */
  async function getMeta(
    _request: FastifyRequest,
    _reply: FastifyReply
  ): Promise<ServerMetaResponse> {
    const uptimeMs = Date.now() - startTime;

    return {
      server: {
        version: SERVER_VERSION,
        uptime: formatUptime(uptimeMs),
        uptimeMs,
      },
      presets: {
        path: ctx.presetsPath,
        count: ctx.presets.size,
      },
      defaults: {
        volumeMl: ctx.reagentConfig.defaultVolumeMl,
        concentrationMolar: ctx.reagentConfig.defaultConcentrationMolar,
        displayPrecision: ctx.reagentConfig.displayPrecision,
      },
    };
  }

  return {
    getMeta,
  };
}

export type MetaHandlers = ReturnType<typeof createMetaHandlers>;
