import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerGmailHandlers } from '../gmail/handlers.js';
import { registerTerminalHandlers } from '../terminal/handlers.js';
import type { ServerContext } from './context.js';

/**
 * Register every tool with the MCP server
 */
export function registerMcpHandlers(server: McpServer, context: ServerContext): void {
  // Register terminal tools
  registerTerminalHandlers(server, context);

  // Register Gmail tools
  registerGmailHandlers(server, context);
}
