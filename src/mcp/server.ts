import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { componentLogger } from '../logger.js';
import type { ServerContext } from './context.js';
import { registerMcpHandlers } from './handlers.js';

const log = componentLogger('mcp');

export const SERVER_NAME = 'terminal-gmail';
export const SERVER_VERSION = '1.0.0';

/**
 * Create an MCP server with every tool registered against `context`.
 * The SSE binding creates one per connection; they all share the context.
 */
export function createMcpServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerMcpHandlers(server, context);
  log.debug(`Server initialized: ${SERVER_NAME} v${SERVER_VERSION}`);

  return server;
}
