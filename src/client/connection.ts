/**
 * MCP client connection: transport selection, tool discovery and invocation
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, McpError, type Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ClientTransportConfig } from '../config/client.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('client');

export const CLIENT_NAME = 'terminal-gmail-agent';
export const CLIENT_VERSION = '1.0.0';

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Tool['inputSchema'];
}

export interface ToolInvocation {
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  content: string;
  isError: boolean;
}

export interface ToolInvoker {
  invoke(invocation: ToolInvocation): Promise<ToolResult>;
}

export function createClientTransport(config: ClientTransportConfig): Transport {
  if (config.kind === 'stdio') {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      stderr: 'inherit'
    });
  }
  return new SSEClientTransport(new URL(config.url));
}

/**
 * Flatten an MCP CallToolResult into text: text parts joined by newlines,
 * other parts as JSON.
 */
export function normalizeToolResult(raw: unknown): ToolResult {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return { content: JSON.stringify(raw) ?? '', isError: false };
  }

  const content = parsed.data.content
    .map(part => (part.type === 'text' ? part.text : JSON.stringify(part)))
    .join('\n');
  return { content, isError: parsed.data.isError === true };
}

export class McpConnection implements ToolInvoker {
  private descriptors: ToolDescriptor[] | null = null;

  private constructor(private readonly client: Client) {}

  /**
   * Connect over `transport`. Resolves once the initialize handshake is done.
   */
  static async open(transport: Transport): Promise<McpConnection> {
    const client = new Client({ name: CLIENT_NAME, version: CLIENT_VERSION });
    await client.connect(transport);

    const server = client.getServerVersion();
    log.info({ server: server?.name, version: server?.version }, 'Connected to MCP server');
    return new McpConnection(client);
  }

  /**
   * List the server's tools. Fetched once; the set is static for the connection.
   */
  async discoverTools(): Promise<ToolDescriptor[]> {
    if (this.descriptors) return this.descriptors;

    const { tools } = await this.client.listTools();
    this.descriptors = tools.map(tool => ({
      name: tool.name,
      description: tool.description ?? '',
      parameters: tool.inputSchema
    }));
    log.info({ count: this.descriptors.length }, 'Discovered tools');
    return this.descriptors;
  }

  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    log.debug({ tool: invocation.name }, 'Calling tool');
    try {
      const raw = await this.client.callTool({ name: invocation.name, arguments: invocation.arguments });
      return normalizeToolResult(raw);
    } catch (error) {
      // Protocol errors for one call (unknown tool, bad arguments) go back to the model
      if (error instanceof McpError) {
        return { content: error.message, isError: true };
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
