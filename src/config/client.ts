/**
 * Agent client configuration loaded from environment variables.
 */
import { z } from 'zod';
import { getEnvVar, type Env } from './env.js';

const transportSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sse'), url: z.string().url() }),
  z.object({ kind: z.literal('stdio'), command: z.string().min(1), args: z.array(z.string()) })
]);

export type ClientTransportConfig = z.infer<typeof transportSchema>;

const clientConfigSchema = z.object({
  apiKey: z.string().min(1),
  modelId: z.string().min(1),
  transport: transportSchema,
  historyMaxTokens: z.coerce.number().int().positive(),
  maxSteps: z.coerce.number().int().positive(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

function loadTransport(env: Env): unknown {
  const kind = getEnvVar(env, 'MCP_TRANSPORT', 'sse');
  if (kind === 'stdio') {
    return {
      kind,
      command: getEnvVar(env, 'MCP_SERVER_COMMAND', 'node'),
      args: getEnvVar(env, 'MCP_SERVER_ARGS', 'dist/server.js --transport stdio').split(/\s+/).filter(Boolean)
    };
  }
  return { kind, url: getEnvVar(env, 'MCP_SERVER_URL', 'http://127.0.0.1:8000/sse') };
}

export function loadClientConfig(env: Env = process.env): ClientConfig {
  return clientConfigSchema.parse({
    apiKey: getEnvVar(env, 'GOOGLE_API_KEY'),
    modelId: getEnvVar(env, 'GEMINI_MODEL', 'gemini-2.0-flash'),
    transport: loadTransport(env),
    historyMaxTokens: getEnvVar(env, 'HISTORY_MAX_TOKENS', '1000'),
    maxSteps: getEnvVar(env, 'AGENT_MAX_STEPS', '10'),
    logLevel: getEnvVar(env, 'LOG_LEVEL', 'warn')
  });
}
