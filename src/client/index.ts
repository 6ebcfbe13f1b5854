#!/usr/bin/env node
import 'dotenv/config';

import { createInterface } from 'node:readline';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { loadClientConfig } from '../config/client.js';
import { logger } from '../logger.js';
import { createClientTransport, McpConnection } from './connection.js';
import { createClientSession, QUIT_COMMAND, runChatLoop } from './session.js';

async function main(): Promise<void> {
  const config = loadClientConfig();
  logger.level = config.logLevel;

  const google = createGoogleGenerativeAI({ apiKey: config.apiKey });
  const model = google(config.modelId);

  const connection = await McpConnection.open(createClientTransport(config.transport));
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const session = await createClientSession(connection, model, {
      historyMaxTokens: config.historyMaxTokens,
      maxSteps: config.maxSteps
    });

    rl.setPrompt('\nQuery: ');
    process.stdout.write(`MCP Client (${config.transport.kind}) Started! Type '${QUIT_COMMAND}' to exit.\n`);

    await runChatLoop(session, {
      lines: rl,
      prompt: () => rl.prompt(),
      write: (text) => process.stdout.write(text)
    });
  } finally {
    rl.close();
    await connection.close();
  }
}

try {
  await main();
} catch (err) {
  logger.fatal({ err }, 'Client failed');
  process.exit(1);
}
