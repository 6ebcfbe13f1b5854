/**
 * Terminal MCP tool handler
 * Implements run_command
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage, runTool, toTextToolResult, type ToolError } from '../mcp/results.js';
import type { ServerContext } from '../mcp/context.js';

function classifyCommandError(error: unknown): ToolError {
  return { kind: 'command_failed', message: errorMessage(error) };
}

export function registerTerminalHandlers(server: McpServer, context: ServerContext): void {
  server.registerTool('run_command', {
    description: `Run a terminal command inside the workspace directory (${context.runner.workspaceDir}). Returns stdout, or stderr when stdout is empty.`,
    inputSchema: {
      command: z.string().describe('Shell command to execute')
    }
  }, async ({ command }) => {
    const outcome = await runTool(() => context.runner.run(command), classifyCommandError);
    return toTextToolResult(outcome);
  });
}
