import { componentLogger } from '@/services/logger';
import type { ConversationEntry, ConversationStore } from './conversation-store';

interface SessionEntry {
  entries: ConversationEntry[];
  timestamp: number;
}

const log = componentLogger('memory');

export class InMemoryConversationStore implements ConversationStore {
  private memory = new Map<string, SessionEntry>();
  private readonly ttl: number;
  private readonly maxSessions: number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(ttlMinutes: number = 60, maxSessions: number = 1000) {
    this.ttl = ttlMinutes * 60 * 1000;
    this.maxSessions = maxSessions;
    this.cleanupInterval = setInterval(() => this.cleanupExpiredSessions(), 5 * 60 * 1000);
    this.cleanupInterval.unref();
  }

  private isExpired(entry: SessionEntry, now: number): boolean {
    return now - entry.timestamp > this.ttl;
  }

  cleanupExpiredSessions(now: number = Date.now()): number {
    let cleaned = 0;

    for (const [sessionId, entry] of this.memory) {
      if (this.isExpired(entry, now)) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    // Over capacity: drop the oldest fifth.
    if (this.memory.size >= this.maxSessions) {
      const oldest = [...this.memory.entries()]
        .sort(([, a], [, b]) => a.timestamp - b.timestamp)
        .slice(0, Math.floor(this.memory.size * 0.2));
      for (const [sessionId] of oldest) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      log.info('memory:cleanup', { cleaned, remaining: this.memory.size });
    }
    return cleaned;
  }

  async get(sessionId: string, limit: number): Promise<ConversationEntry[]> {
    const entry = this.memory.get(sessionId);
    if (!entry || limit <= 0) return [];

    const now = Date.now();
    if (this.isExpired(entry, now)) {
      this.memory.delete(sessionId);
      return [];
    }
    entry.timestamp = now;
    return entry.entries.slice(-limit).map((e) => ({ ...e }));
  }

  async append(sessionId: string, ...entries: ConversationEntry[]): Promise<void> {
    const existing = this.memory.get(sessionId);
    if (existing && !this.isExpired(existing, Date.now())) {
      existing.entries.push(...entries.map((e) => ({ ...e })));
      existing.timestamp = Date.now();
      return;
    }
    if (this.memory.size >= this.maxSessions) {
      this.cleanupExpiredSessions();
    }
    this.memory.set(sessionId, { entries: entries.map((e) => ({ ...e })), timestamp: Date.now() });
  }

  size(): number {
    return this.memory.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.memory.clear();
  }
}
