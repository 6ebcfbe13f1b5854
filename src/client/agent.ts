/**
 * One agent turn: the model may call tools any number of times (up to
 * `maxSteps`) before producing its final answer.
 */
import { generateText, stepCountIs, type LanguageModel, type ModelMessage, type ToolSet } from 'ai';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant connected to MCP tools.';
export const DEFAULT_MAX_STEPS = 10;

export interface AgentTurnInput {
  model: LanguageModel;
  tools: ToolSet;
  history: ModelMessage[];
  query: string;
  system?: string;
  maxSteps?: number;
}

export interface AgentTurn {
  text: string;
  steps: number;
  toolCalls: string[];
  messages: ModelMessage[];
}

export async function runAgentTurn(input: AgentTurnInput): Promise<AgentTurn> {
  const result = await generateText({
    model: input.model,
    system: input.system ?? DEFAULT_SYSTEM_PROMPT,
    messages: [...input.history, { role: 'user', content: input.query }],
    tools: input.tools,
    stopWhen: stepCountIs(input.maxSteps ?? DEFAULT_MAX_STEPS),
    temperature: 0,
    maxRetries: 2
  });

  return {
    text: result.text,
    steps: result.steps.length,
    toolCalls: result.steps.flatMap(step => step.toolCalls.map(call => call.toolName)),
    messages: result.response.messages
  };
}
