// node/src/memory/conversation-store.ts: conversation history accessor

export interface ConversationEntry {
  role: 'user' | 'assistant';
  content: string;
  /** ISO-8601 */
  createdAt: string;
}

/**
 * Injected into the supervisor. The pipeline only reads the recent window and
 * appends finished turns; retention is the store's business.
 */
export interface ConversationStore {
  /** The last `limit` entries in chronological order. */
  get(sessionId: string, limit: number): Promise<ConversationEntry[]>;
  append(sessionId: string, ...entries: ConversationEntry[]): Promise<void>;
}

/** Renders history for prompts, oldest first. */
export function formatHistory(entries: readonly ConversationEntry[]): string {
  return entries
    .map((entry) => `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
    .join('\n');
}
