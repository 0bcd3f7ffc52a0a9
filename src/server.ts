import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerPackTool } from './tools/pack.js';
import { registerJobTool } from './tools/job.js';

/**
 * Builds the MCP server with every sheetpack tool registered.
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: 'sheetpack-mcp',
    version: '1.0.0',
  });

  registerPackTool(server);
  registerJobTool(server);

  return server;
}
