/**
 * MCP tools for reagent preparation.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { preparationInputShape } from '../../reagent/PreparationInput.js';
import { jsonResult, toolErrorResult } from '../helpers.js';

export function registerReagentTools(server: McpServer, ctx: AppContext): void {
  // ── reagent_prepare ────────────────────────────────────────────
  server.tool(
    'reagent_prepare',
    'Calculate how much reagent is needed to make a solution of a given volume and molarity. ' +
      'Solids return grams to weigh; liquid concentrates return grams and mL of concentrate. ' +
      'Name a preset (see reagent_presets) or give the chemical inline.',
    preparationInputShape,
    async (args) => {
      try {
        return jsonResult(ctx.reagents.prepare(args));
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // ── reagent_presets ────────────────────────────────────────────
  server.tool(
    'reagent_presets',
    'List the bundled reagent presets with their molar mass, and density and purity for liquid concentrates.',
    {},
    async () => {
      const presets = ctx.reagents.listPresets();
      return jsonResult({ presets, total: presets.length });
    }
  );
}
