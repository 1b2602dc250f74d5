// node/src/rag/retriever.ts: vector search blended with a BM25-like lexical score

import type BaseEmbedding from '@/models/base/embedding';
import { componentLogger, type AppLogger } from '@/services/logger';
import { errorMessage, RetrievalError, TurnCancelledError } from '@/stability/errors';
import { retryWithBackoff } from '@/stability/retryWithBackoff';
import { withTimeout } from '@/stability/timeout';
import { compareIds, type DocumentStore } from './document-store';
import type { ScoredChunk } from './types';
import { bm25LikeScore, tokenize } from './vector-utils';

export interface RetrieverOptions {
  topK: number;
  /** Candidates fetched per returned chunk, before de-duplication. */
  overfetch: number;
  vectorWeight: number;
  bm25Weight: number;
  embeddingTimeoutMs: number;
  retryDelayMs: number;
}

export class HybridRetriever {
  private readonly log: AppLogger;

  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: BaseEmbedding<unknown>,
    private readonly options: RetrieverOptions,
    log?: AppLogger,
  ) {
    this.log = log ?? componentLogger('retriever');
  }

  /**
   * At most `topK` chunks, one per source URL, by non-increasing score. Ties go to
   * the newer publication, then to the smaller chunk id.
   *
   * @throws RetrievalError when embedding or search still fails after one retry
   */
  async retrieve(query: string, signal?: AbortSignal): Promise<ScoredChunk[]> {
    const { topK, overfetch } = this.options;
    const started = Date.now();

    let candidates: ScoredChunk[];
    try {
      candidates = await retryWithBackoff(
        async () => {
          const [vector] = await withTimeout(
            (callSignal) => this.embedder.embedText([query], callSignal),
            { timeoutMs: this.options.embeddingTimeoutMs, label: 'embedding', stage: 'retrieve', signal },
          );
          if (!vector || vector.length === 0) {
            throw new RetrievalError('Embedding model returned no vector');
          }
          return this.store.query(vector, topK * overfetch);
        },
        {
          maxRetries: 1,
          initialDelay: this.options.retryDelayMs,
          shouldRetry: () => true,
          signal,
          stage: 'retrieve',
          onRetry: (error) => this.log.warn('rag:retrieve_retry', { error: errorMessage(error) }),
        },
      );
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      throw new RetrievalError(`Retrieval failed: ${errorMessage(error)}`, { cause: error });
    }

    const ranked = this.blend(query, candidates).sort(compareRanked);
    const results = dedupeBySource(ranked).slice(0, topK);

    this.log.debug('rag:retrieve_done', {
      candidates: candidates.length,
      returned: results.length,
      latencyMs: Date.now() - started,
    });
    return results;
  }

  private blend(query: string, candidates: ScoredChunk[]): ScoredChunk[] {
    const { vectorWeight, bm25Weight } = this.options;
    const totalWeight = vectorWeight + bm25Weight;
    if (bm25Weight === 0 || totalWeight === 0 || candidates.length === 0) {
      return candidates.map((c) => ({ ...c }));
    }

    const queryTokens = tokenize(query);
    const docTokens = candidates.map((c) => tokenize(c.chunk.text));
    const avgDocLength = docTokens.reduce((sum, t) => sum + t.length, 0) / docTokens.length;
    const lexical = docTokens.map((tokens) => bm25LikeScore(queryTokens, tokens, avgDocLength));
    const maxLexical = Math.max(...lexical);

    return candidates.map((c, i) => {
      const normalizedLexical = maxLexical > 0 ? lexical[i] / maxLexical : 0;
      return {
        chunk: c.chunk,
        score: (vectorWeight * c.score + bm25Weight * normalizedLexical) / totalWeight,
      };
    });
  }
}

function publishedTime(chunk: ScoredChunk): number {
  const at = chunk.chunk.metadata.publishedAt;
  const time = at ? Date.parse(at) : Number.NaN;
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

function compareRanked(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  const newer = publishedTime(b) - publishedTime(a);
  if (newer !== 0 && !Number.isNaN(newer)) return newer;
  return compareIds(a.chunk.id, b.chunk.id);
}

/** Keeps the first (best ranked) chunk of every source URL. */
export function dedupeBySource(ranked: ScoredChunk[]): ScoredChunk[] {
  const seen = new Set<string>();
  return ranked.filter(({ chunk }) => {
    if (seen.has(chunk.sourceUrl)) return false;
    seen.add(chunk.sourceUrl);
    return true;
  });
}
