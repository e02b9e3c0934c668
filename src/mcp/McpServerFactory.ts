/**
 * Factory function for creating the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';

/**
 * Create and configure an MCP server bound to the given AppContext.
 */
export function createMcpServer(ctx: AppContext): McpServer {
  const server = new McpServer(
    { name: 'labprep', version: '0.1.0' },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  registerAllTools(server, ctx);
  registerAllResources(server, ctx);

  return server;
}
