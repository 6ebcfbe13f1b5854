/**
 * Client session: the agent's tools, the model and the
 * conversation history, plus the interactive query loop over them.
 */
import type { LanguageModel, ToolSet } from 'ai';
import { componentLogger } from '../logger.js';
import { runAgentTurn } from './agent.js';
import type { ToolDescriptor, ToolInvoker } from './connection.js';
import { ConversationHistory, createModelSummarizer } from './history.js';
import { renderResponse } from './render.js';
import { toAiTools } from './tools.js';

const log = componentLogger('client');

export const QUIT_COMMAND = 'quit';

/** Where the session finds its tools; McpConnection in practice */
export interface ToolSource extends ToolInvoker {
  discoverTools(): Promise<ToolDescriptor[]>;
}

export interface ClientSession {
  model: LanguageModel;
  tools: ToolSet;
  history: ConversationHistory;
  maxSteps: number;
}

export interface SessionOptions {
  historyMaxTokens: number;
  maxSteps: number;
}

export async function createClientSession(
  source: ToolSource,
  model: LanguageModel,
  options: SessionOptions
): Promise<ClientSession> {
  const descriptors = await source.discoverTools();
  return {
    model,
    tools: toAiTools(source, descriptors),
    history: new ConversationHistory(createModelSummarizer(model), options.historyMaxTokens),
    maxSteps: options.maxSteps
  };
}

/**
 * Run one query through the agent and record the exchange in history.
 * Returns the rendered response.
 */
export async function handleQuery(session: ClientSession, query: string): Promise<string> {
  const history = await session.history.load();
  const turn = await runAgentTurn({
    model: session.model,
    tools: session.tools,
    history,
    query,
    maxSteps: session.maxSteps
  });
  session.history.addTurn(query, turn.text);

  log.debug({ steps: turn.steps, toolCalls: turn.toolCalls }, 'Agent turn finished');
  return renderResponse(turn);
}

export function isQuit(input: string): boolean {
  return input.trim().toLowerCase() === QUIT_COMMAND;
}

export interface ChatIO {
  lines: AsyncIterable<string>;
  prompt(): void;
  write(text: string): void;
}

/**
 * Read queries until `quit` or end of input. A failed turn is reported and
 * the loop carries on with the next query.
 */
export async function runChatLoop(session: ClientSession, io: ChatIO): Promise<void> {
  io.prompt();
  for await (const line of io.lines) {
    const query = line.trim();
    if (isQuit(query)) break;

    if (query) {
      try {
        const output = await handleQuery(session, query);
        io.write(`\nResponse:\n${output}\n`);
      } catch (error) {
        log.error({ err: error }, 'Agent turn failed');
        io.write(`\nError: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
    io.prompt();
  }
}
