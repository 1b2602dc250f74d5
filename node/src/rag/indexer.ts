import { z } from 'zod';
import type BaseEmbedding from '@/models/base/embedding';
import { componentLogger, type AppLogger } from '@/services/logger';
import { ValidationError } from '@/stability/errors';
import { chunkId, splitIntoChunks } from './chunker';
import type { DocumentStore } from './document-store';
import type { DocumentChunk, SourceDocument } from './types';

export const sourceDocumentSchema = z.object({
  url: z.string().min(1),
  title: z.string().default(''),
  category: z.string().default('general'),
  publishedAt: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO date')
    .optional(),
  text: z.string().min(1),
});

export interface IndexerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Splits, embeds and stores source documents. Re-ingesting a source replaces all of
 * its previous chunks; identical content yields identical chunk ids.
 */
export class DocumentIndexer {
  private readonly log: AppLogger;

  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: BaseEmbedding<unknown>,
    private readonly options: IndexerOptions,
    log?: AppLogger,
  ) {
    this.log = log ?? componentLogger('indexer');
  }

  async ingest(input: SourceDocument, signal?: AbortSignal): Promise<DocumentChunk[]> {
    const parsed = sourceDocumentSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(`Invalid source document ${input.url}`, parsed.error.issues);
    }
    const source = parsed.data;

    const windows = splitIntoChunks(source.text, this.options.chunkSize, this.options.chunkOverlap);
    const embeddings = await this.embedder.embedChunks(windows, signal);

    const chunks: DocumentChunk[] = windows.map((window, i) => ({
      id: chunkId(source.url, window.index, window.text),
      sourceUrl: source.url,
      text: window.text,
      embedding: embeddings[i] ?? [],
      metadata: {
        title: source.title,
        category: source.category,
        publishedAt: source.publishedAt,
        chunkIndex: window.index,
      },
    }));

    const removed = await this.store.deleteBySource(source.url);
    await this.store.upsert(chunks);
    this.log.info('indexer:ingested', { url: source.url, chunks: chunks.length, replaced: removed });
    return chunks;
  }

  async ingestAll(sources: SourceDocument[], signal?: AbortSignal): Promise<number> {
    let total = 0;
    for (const source of sources) {
      total += (await this.ingest(source, signal)).length;
    }
    return total;
  }
}
