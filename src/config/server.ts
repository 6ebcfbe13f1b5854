/**
 * Tool server configuration loaded from environment variables.
 * Validated once at startup so a bad value fails fast.
 */
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getEnvVar, type Env } from './env.js';

export const DELETE_MODES = ['trash', 'permanent'] as const;
export type DeleteMode = (typeof DELETE_MODES)[number];

export const TRANSPORTS = ['sse', 'stdio'] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

const serverConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  workspaceDir: z.string().min(1),
  commandTimeoutMs: z.coerce.number().int().positive(),
  gmail: z.object({
    tokenPath: z.string().min(1),
    credentialsPath: z.string().min(1),
    oauthPort: z.coerce.number().int().min(1).max(65535),
    deleteMode: z.enum(DELETE_MODES)
  })
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export function defaultWorkspaceDir(): string {
  return path.join(os.homedir(), 'understanding-mcp', 'workspace');
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return serverConfigSchema.parse({
    host: getEnvVar(env, 'MCP_HOST', '127.0.0.1'),
    port: getEnvVar(env, 'MCP_PORT', '8000'),
    logLevel: getEnvVar(env, 'LOG_LEVEL', 'info'),
    workspaceDir: getEnvVar(env, 'WORKSPACE_DIR', defaultWorkspaceDir()),
    commandTimeoutMs: getEnvVar(env, 'COMMAND_TIMEOUT_MS', '60000'),
    gmail: {
      tokenPath: path.resolve(getEnvVar(env, 'GMAIL_TOKEN_PATH', 'token.json')),
      credentialsPath: path.resolve(getEnvVar(env, 'GMAIL_CREDENTIALS_PATH', 'credentials.json')),
      oauthPort: getEnvVar(env, 'GMAIL_OAUTH_PORT', '8080'),
      deleteMode: getEnvVar(env, 'GMAIL_DELETE_MODE', 'trash')
    }
  });
}

function isTransportKind(value: string): value is TransportKind {
  return (TRANSPORTS as readonly string[]).includes(value);
}

/**
 * Transport binding from the command line: `--transport sse|stdio`, default sse
 */
export function parseTransport(argv: string[]): TransportKind {
  const { values } = parseArgs({
    args: argv,
    options: {
      transport: { type: 'string', short: 't', default: 'sse' }
    }
  });
  const transport = values.transport ?? 'sse';
  if (!isTransportKind(transport)) {
    throw new Error(`Unknown transport "${transport}". Expected one of: ${TRANSPORTS.join(', ')}`);
  }
  return transport;
}
