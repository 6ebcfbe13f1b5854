#!/usr/bin/env node
import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig, parseTransport } from './config/server.js';
import { logger } from './logger.js';
import { createServerContext } from './mcp/context.js';
import { createMcpServer } from './mcp/server.js';
import { buildSseApp, SSE_PATH } from './routes/sse.js';

async function main(): Promise<void> {
  const transport = parseTransport(process.argv.slice(2));
  const config = loadServerConfig();
  logger.level = config.logLevel;

  const context = await createServerContext(config);
  logger.info({ transport, workspace: config.workspaceDir, deleteMode: config.gmail.deleteMode }, 'Starting terminal + Gmail MCP server');

  if (transport === 'stdio') {
    const server = createMcpServer(context);
    const shutdown = () => {
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await server.connect(new StdioServerTransport());
    logger.info('MCP server listening on stdio');
    return;
  }

  const app = await buildSseApp(context, logger);
  const shutdown = () => {
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port: config.port, host: config.host });
  logger.info(`MCP SSE endpoint at http://${config.host}:${config.port}${SSE_PATH}`);
}

try {
  await main();
} catch (err) {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
}
