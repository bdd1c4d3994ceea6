import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { INSTRUCTIONS } from './instructions.js';
import { registerGetTool } from './tools/get.js';
import { registerListTool } from './tools/list.js';
import { registerTaxonomyTool } from './tools/taxonomy.js';
import { registerStatusTool } from './tools/status.js';
import type { ToolContext } from './tools/context.js';

export const SERVER_NAME = 'postsync';
export const SERVER_VERSION = '1.0.0';

/** Create the MCP server with every query tool registered against `context`. */
export function createServer(context: ToolContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS },
  );

  registerGetTool(server, context);
  registerListTool(server, context);
  registerTaxonomyTool(server, context);
  registerStatusTool(server, context);

  return server;
}
