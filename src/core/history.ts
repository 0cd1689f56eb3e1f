export type HistoryRole = 'system' | 'user' | 'assistant';

export interface HistoryMessage {
  role: HistoryRole;
  content: string;
  timestamp: number;
}

/**
 * Conversation context handed to the decision-maker. Bounded: once `limit`
 * is exceeded the oldest non-system messages are dropped first.
 */
export class ConversationHistory {
  private messages: HistoryMessage[] = [];

  constructor(private limit = 50) {}

  add(role: HistoryRole, content: string): void {
    this.messages.push({ role, content, timestamp: Date.now() });
    this.trim();
  }

  addShellOutput(command: string, output: string): void {
    this.add('system', `[shell]\ncommand: ${command}\noutput: ${output}`);
  }

  /**
   * The last `count` messages. When none of them is a system message the
   * most recent one is prepended so the model keeps its standing context.
   */
  recent(count = 20): HistoryMessage[] {
    if (this.messages.length <= count) return [...this.messages];
    const tail = this.messages.slice(-count);
    if (tail.some(m => m.role === 'system')) return tail;
    const lastSystem = [...this.messages].reverse().find(m => m.role === 'system');
    return lastSystem ? [lastSystem, ...tail] : tail;
  }

  size(): number {
    return this.messages.length;
  }

  private trim(): void {
    while (this.messages.length > this.limit) {
      const index = this.messages.findIndex(m => m.role !== 'system');
      this.messages.splice(index === -1 ? 0 : index, 1);
    }
  }
}
