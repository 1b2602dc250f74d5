import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import BaseEmbedding from '@/models/base/embedding';
import { InMemoryDocumentStore } from '@/rag/document-store';
import { HybridRetriever, type RetrieverOptions } from '@/rag/retriever';
import type { DocumentChunk } from '@/rag/types';
import { RetrievalError } from '@/stability/errors';

/** Every text embeds to the same vector; `failures` calls fail first. */
class FixedEmbedding extends BaseEmbedding<{ vector: number[] }> {
  calls = 0;

  constructor(
    vector: number[],
    private failures = 0,
  ) {
    super({ vector });
  }

  async embedText(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('embedding service unavailable');
    }
    return texts.map(() => [...this.config.vector]);
  }
}

function chunk(id: string, sourceUrl: string, embedding: number[], publishedAt?: string): DocumentChunk {
  return {
    id,
    sourceUrl,
    text: `text of ${id}`,
    embedding,
    metadata: { title: id, category: 'test', publishedAt, chunkIndex: 0 },
  };
}

const options: RetrieverOptions = {
  topK: 2,
  overfetch: 2,
  vectorWeight: 1,
  bm25Weight: 0,
  embeddingTimeoutMs: 1000,
  retryDelayMs: 0,
};

async function seededStore(): Promise<InMemoryDocumentStore> {
  const store = new InMemoryDocumentStore();
  await store.upsert([
    chunk('c1', 'https://example.org/a', [1, 0], '2023-01-01'),
    chunk('c2', 'https://example.org/a', [0.9, 0.1], '2023-01-01'),
    chunk('c3', 'https://example.org/b', [1, 0], '2024-01-01'),
    chunk('c4', 'https://example.org/c', [0, 1]),
  ]);
  return store;
}

describe('InMemoryDocumentStore', () => {
  it('breaks score ties by chunk id', async () => {
    const store = new InMemoryDocumentStore();
    await store.upsert([chunk('b', 'u1', [1, 0]), chunk('a', 'u2', [1, 0]), chunk('c', 'u3', [0, 1])]);

    const results = await store.query([1, 0], 2);

    expect(results.map((r) => r.chunk.id)).toEqual(['a', 'b']);
  });

  it('deletes every chunk of a source', async () => {
    const store = await seededStore();

    expect(await store.deleteBySource('https://example.org/a')).toBe(2);
    expect(await store.count()).toBe(2);
  });

  it('stores chunks frozen', async () => {
    const store = await seededStore();
    const [top] = await store.query([0, 1], 1);

    expect(Object.isFrozen(top.chunk)).toBe(true);
  });

  it('restores a saved snapshot', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'city-index-'));
    try {
      const file = path.join(dir, 'nested', 'index.json');
      await (await seededStore()).save(file);

      const restored = new InMemoryDocumentStore();
      expect(await restored.load(file)).toBe(4);
      expect((await restored.query([0, 1], 1))[0].chunk.id).toBe('c4');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('HybridRetriever', () => {
  it('returns at most topK chunks, one per source, newer first on ties', async () => {
    const retriever = new HybridRetriever(await seededStore(), new FixedEmbedding([1, 0]), options);

    const results = await retriever.retrieve('замена паспорта');

    // c1 and c3 both score 1; c3 is newer. c2 repeats the source of c1.
    expect(results.map((r) => r.chunk.id)).toEqual(['c3', 'c1']);
    expect(results[0].score).toBeGreaterThanOrEqual(results[1].score);
  });

  it('keeps scores non-increasing with lexical blending', async () => {
    const retriever = new HybridRetriever(await seededStore(), new FixedEmbedding([1, 0]), {
      ...options,
      topK: 3,
      vectorWeight: 0.5,
      bm25Weight: 0.5,
    });

    const scores = (await retriever.retrieve('text of c4')).map((r) => r.score);

    expect(scores).toHaveLength(3);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  it('retries the embedding once', async () => {
    const embedder = new FixedEmbedding([1, 0], 1);
    const retriever = new HybridRetriever(await seededStore(), embedder, options);

    await expect(retriever.retrieve('паспорт')).resolves.toHaveLength(2);
    expect(embedder.calls).toBe(2);
  });

  it('raises RetrievalError when the retry fails too', async () => {
    const embedder = new FixedEmbedding([1, 0], 5);
    const retriever = new HybridRetriever(await seededStore(), embedder, options);

    await expect(retriever.retrieve('паспорт')).rejects.toBeInstanceOf(RetrievalError);
    expect(embedder.calls).toBe(2);
  });

  it('raises RetrievalError when the embedding times out', async () => {
    class HangingEmbedding extends BaseEmbedding<null> {
      embedText(_texts: string[], signal?: AbortSignal): Promise<number[][]> {
        return new Promise((_, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }
    }
    const retriever = new HybridRetriever(await seededStore(), new HangingEmbedding(null), {
      ...options,
      embeddingTimeoutMs: 10,
    });

    await expect(retriever.retrieve('паспорт')).rejects.toThrow('embedding timed out after 10ms');
  });
});
