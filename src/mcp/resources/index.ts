/**
 * Aggregator that registers all MCP resources on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerPresetResources } from './presetResources.js';

export function registerAllResources(server: McpServer, ctx: AppContext): void {
  registerPresetResources(server, ctx);
}
