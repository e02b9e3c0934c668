/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerReagentTools } from './reagentTools.js';

export function registerAllTools(server: McpServer, ctx: AppContext): void {
  registerReagentTools(server, ctx);
}
