import type { ServerConfig } from '../config/server.js';
import { GmailAdapter } from '../gmail/client.js';
import { createGmailConnector } from '../gmail/auth.js';
import { CommandRunner } from '../terminal/runner.js';

/**
 * Everything a tool handler needs, built once per process and passed to
 * handler registration.
 */
export interface ServerContext {
  config: ServerConfig;
  gmail: GmailAdapter;
  runner: CommandRunner;
}

export async function createServerContext(config: ServerConfig): Promise<ServerContext> {
  const runner = new CommandRunner({
    workspaceDir: config.workspaceDir,
    timeoutMs: config.commandTimeoutMs
  });
  await runner.ensureWorkspace();

  const gmail = new GmailAdapter(createGmailConnector(config.gmail), {
    deleteMode: config.gmail.deleteMode
  });

  return { config, gmail, runner };
}
