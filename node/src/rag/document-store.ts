// node/src/rag/document-store.ts: chunk storage with cosine similarity search

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { DocumentChunk, ScoredChunk } from './types';
import { cosineSimilarity } from './vector-utils';

/**
 * Mutation (`upsert`, `deleteBySource`) belongs to ingestion only; the graphs call
 * `query`.
 */
export interface DocumentStore {
  upsert(chunks: DocumentChunk[]): Promise<void>;
  deleteBySource(sourceUrl: string): Promise<number>;
  /** The `k` nearest chunks by cosine similarity, best first, ties by chunk id. */
  query(vector: readonly number[], k: number): Promise<ScoredChunk[]>;
  count(): Promise<number>;
}

const snapshotSchema = z.object({
  version: z.literal(1),
  chunks: z.array(
    z.object({
      id: z.string().min(1),
      sourceUrl: z.string().min(1),
      text: z.string(),
      embedding: z.array(z.number()),
      metadata: z.object({
        title: z.string(),
        category: z.string(),
        publishedAt: z.string().optional(),
        chunkIndex: z.number().int().nonnegative(),
      }),
    }),
  ),
});

export class InMemoryDocumentStore implements DocumentStore {
  private readonly chunks = new Map<string, DocumentChunk>();

  async upsert(chunks: DocumentChunk[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, Object.freeze({ ...chunk, metadata: Object.freeze({ ...chunk.metadata }) }));
    }
  }

  async deleteBySource(sourceUrl: string): Promise<number> {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.sourceUrl === sourceUrl) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async query(vector: readonly number[], k: number): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    return [...this.chunks.values()]
      .map((chunk) => ({ chunk, score: cosineSimilarity(vector, chunk.embedding) }))
      .sort((a, b) => b.score - a.score || compareIds(a.chunk.id, b.chunk.id))
      .slice(0, k);
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }

  /** Writes every chunk, embeddings included, to a JSON snapshot. */
  async save(filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const chunks = [...this.chunks.values()].sort((a, b) => compareIds(a.id, b.id));
    await writeFile(filePath, JSON.stringify({ version: 1, chunks }), 'utf8');
  }

  /** Replaces the store content with a snapshot written by `save`. Returns the chunk count. */
  async load(filePath: string): Promise<number> {
    const raw = await readFile(filePath, 'utf8');
    const snapshot = snapshotSchema.parse(JSON.parse(raw));
    this.chunks.clear();
    await this.upsert(snapshot.chunks);
    return this.chunks.size;
  }
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
