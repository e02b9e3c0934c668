/**
 * MCP resources for preset discovery.
 */

import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';

export function registerPresetResources(server: McpServer, ctx: AppContext): void {
  server.resource(
    'preset',
    new ResourceTemplate('preset://{presetId}', {
      list: async () => {
        return {
          resources: ctx.presets.list().map((preset) => ({
            uri: `preset://${encodeURIComponent(preset.id)}`,
            name: preset.name ?? preset.formula,
            mimeType: 'application/json',
          })),
        };
      },
    }),
    { description: 'Reagent preset: molar mass, and density and purity for liquid concentrates' },
    async (uri, variables) => {
      const presetId = decodeURIComponent(String(variables.presetId));
      const preset = ctx.presets.get(presetId);
      if (!preset) {
        return { contents: [] };
      }
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(preset, null, 2),
          },
        ],
      };
    }
  );
}
