import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadClientConfig } from '../client.js';
import { defaultWorkspaceDir, loadServerConfig, parseTransport } from '../server.js';

describe('defaultWorkspaceDir', () => {
  it('lives under the home directory', () => {
    expect(defaultWorkspaceDir()).toBe(path.join(os.homedir(), 'understanding-mcp', 'workspace'));
  });
});

describe('loadServerConfig', () => {
  it('applies defaults', () => {
    expect(loadServerConfig({})).toEqual({
      host: '127.0.0.1',
      port: 8000,
      logLevel: 'info',
      workspaceDir: defaultWorkspaceDir(),
      commandTimeoutMs: 60000,
      gmail: {
        tokenPath: path.resolve('token.json'),
        credentialsPath: path.resolve('credentials.json'),
        oauthPort: 8080,
        deleteMode: 'trash'
      }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadServerConfig({
      MCP_PORT: '9100',
      WORKSPACE_DIR: '/tmp/ws',
      GMAIL_DELETE_MODE: 'permanent',
      GMAIL_TOKEN_PATH: '/secrets/token.json'
    });
    expect(config.port).toBe(9100);
    expect(config.workspaceDir).toBe('/tmp/ws');
    expect(config.gmail.deleteMode).toBe('permanent');
    expect(config.gmail.tokenPath).toBe(path.resolve('/secrets/token.json'));
  });

  it('rejects invalid values', () => {
    expect(() => loadServerConfig({ MCP_PORT: 'abc' })).toThrow();
    expect(() => loadServerConfig({ GMAIL_DELETE_MODE: 'shred' })).toThrow();
  });
});

describe('parseTransport', () => {
  it('defaults to sse', () => {
    expect(parseTransport([])).toBe('sse');
  });

  it('accepts the long and short flag', () => {
    expect(parseTransport(['--transport', 'stdio'])).toBe('stdio');
    expect(parseTransport(['-t', 'sse'])).toBe('sse');
  });

  it('rejects an unknown transport', () => {
    expect(() => parseTransport(['--transport', 'websocket'])).toThrow('Unknown transport "websocket". Expected one of: sse, stdio');
  });
});

describe('loadClientConfig', () => {
  it('requires an API key', () => {
    expect(() => loadClientConfig({})).toThrow('Missing required environment variable: GOOGLE_API_KEY');
  });

  it('defaults to the SSE transport', () => {
    expect(loadClientConfig({ GOOGLE_API_KEY: 'test-key' })).toEqual({
      apiKey: 'test-key',
      modelId: 'gemini-2.0-flash',
      transport: { kind: 'sse', url: 'http://127.0.0.1:8000/sse' },
      historyMaxTokens: 1000,
      maxSteps: 10,
      logLevel: 'warn'
    });
  });

  it('builds a stdio transport from command and args', () => {
    const config = loadClientConfig({
      GOOGLE_API_KEY: 'test-key',
      MCP_TRANSPORT: 'stdio',
      MCP_SERVER_COMMAND: 'npx',
      MCP_SERVER_ARGS: 'tsx  src/server.ts --transport stdio'
    });
    expect(config.transport).toEqual({
      kind: 'stdio',
      command: 'npx',
      args: ['tsx', 'src/server.ts', '--transport', 'stdio']
    });
  });
});
