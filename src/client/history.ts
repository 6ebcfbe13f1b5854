/**
 * Rolling conversation history with summary compaction.
 *
 * Messages are kept verbatim until their estimated size passes `maxTokens`.
 * The next `load()` then folds the oldest messages into a running summary,
 * always keeping the most recent user/assistant turn as it was.
 */
import { generateText, type LanguageModel, type ModelMessage } from 'ai';

export const DEFAULT_MAX_TOKENS = 1000;

// Latest user message and its answer
const RECENT_MESSAGES_KEPT = 2;

export type Summarizer = (previousSummary: string | null, messages: ModelMessage[]) => Promise<string>;

export function messageText(message: ModelMessage): string {
  return typeof message.content === 'string' ? message.content : JSON.stringify(message.content);
}

export function estimateTokens(messages: ModelMessage[]): number {
  return messages.reduce((total, message) => total + Math.ceil(messageText(message).length / 4), 0);
}

export function summaryMessage(summary: string): ModelMessage {
  return { role: 'system', content: `Summary of the earlier conversation: ${summary}` };
}

export class ConversationHistory {
  private messages: ModelMessage[] = [];
  private summary: string | null = null;

  constructor(
    private readonly summarize: Summarizer,
    private readonly maxTokens = DEFAULT_MAX_TOKENS
  ) {}

  add(message: ModelMessage): void {
    this.messages.push(message);
  }

  addTurn(query: string, answer: string): void {
    this.add({ role: 'user', content: query });
    this.add({ role: 'assistant', content: answer });
  }

  /** Estimated size of the messages kept verbatim */
  tokenCount(): number {
    return estimateTokens(this.messages);
  }

  get currentSummary(): string | null {
    return this.summary;
  }

  /**
   * History to send with the next request, compacting first when over budget.
   */
  async load(): Promise<ModelMessage[]> {
    if (this.tokenCount() > this.maxTokens) {
      await this.compact();
    }
    return this.summary === null ? [...this.messages] : [summaryMessage(this.summary), ...this.messages];
  }

  private async compact(): Promise<void> {
    const prunable = this.messages.length - RECENT_MESSAGES_KEPT;
    // Without a summary yet, pruning one message and adding the summary would not shrink the list
    const minimum = this.summary === null ? 2 : 1;
    if (prunable < minimum) return;

    let count = 0;
    while (count < prunable && estimateTokens(this.messages.slice(count)) > this.maxTokens) {
      count++;
    }
    count = Math.max(count, minimum);

    const pruned = this.messages.slice(0, count);
    this.summary = await this.summarize(this.summary, pruned);
    this.messages = this.messages.slice(count);
  }
}

function transcript(messages: ModelMessage[]): string {
  return messages
    .map(message => `${message.role === 'user' ? 'User' : message.role === 'assistant' ? 'Assistant' : message.role}: ${messageText(message)}`)
    .join('\n');
}

export function buildSummaryPrompt(previousSummary: string | null, messages: ModelMessage[]): string {
  return [
    'Progressively summarize the conversation below, extending the current summary with the new lines.',
    'Keep names, email addresses, message IDs, label names and decisions. Reply with the new summary only.',
    '',
    'Current summary:',
    previousSummary ?? '(none)',
    '',
    'New lines of conversation:',
    transcript(messages)
  ].join('\n');
}

export function createModelSummarizer(model: LanguageModel): Summarizer {
  return async (previousSummary, messages) => {
    const { text } = await generateText({
      model,
      temperature: 0,
      prompt: buildSummaryPrompt(previousSummary, messages)
    });
    return text.trim();
  };
}
