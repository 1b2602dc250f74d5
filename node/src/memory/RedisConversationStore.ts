// node/src/memory/RedisConversationStore.ts

import { Redis } from 'ioredis';
import { z } from 'zod';
import { componentLogger } from '@/services/logger';
import type { ConversationEntry, ConversationStore } from './conversation-store';

const log = componentLogger('memory');

const entrySchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  createdAt: z.string(),
});

/**
 * Redis-backed conversation history: one list per session, refreshed TTL on append.
 * Persistent across server restarts, shared between instances.
 */
export class RedisConversationStore implements ConversationStore {
  private readonly client: Redis;
  private readonly ttl: number;
  private readonly keyPrefix = 'conversation:';
  private readonly maxEntries: number;

  constructor(redisUrl: string, ttlMinutes: number = 60, maxEntries: number = 200) {
    this.ttl = ttlMinutes * 60; // Redis TTL is in seconds
    this.maxEntries = maxEntries;
    this.client = new Redis(redisUrl, {
      retryStrategy: (times) => Math.min(times * 50, 30000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    this.client.on('error', (err: Error) => log.error('memory:redis_error', { error: err.message }));
    this.client.on('ready', () => log.info('memory:redis_ready'));
    this.client.on('close', () => log.warn('memory:redis_closed'));
  }

  private getKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  async get(sessionId: string, limit: number): Promise<ConversationEntry[]> {
    if (limit <= 0) return [];
    const raw = await this.client.lrange(this.getKey(sessionId), -limit, -1);
    const entries: ConversationEntry[] = [];
    for (const item of raw) {
      const parsed = entrySchema.safeParse(JSON.parse(item));
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        log.warn('memory:redis_bad_entry', { sessionId });
      }
    }
    return entries;
  }

  async append(sessionId: string, ...entries: ConversationEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const key = this.getKey(sessionId);
    await this.client
      .multi()
      .rpush(key, ...entries.map((e) => JSON.stringify(e)))
      .ltrim(key, -this.maxEntries, -1)
      .expire(key, this.ttl)
      .exec();
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}
