/**
 * Corpus types shared by ingestion, the document store and retrieval.
 */

export interface ChunkMetadata {
  title: string;
  category: string;
  /** ISO-8601 date of the source publication, when known. */
  publishedAt?: string;
  chunkIndex: number;
}

/** Immutable once indexed. */
export interface DocumentChunk {
  readonly id: string;
  readonly sourceUrl: string;
  readonly text: string;
  readonly embedding: readonly number[];
  readonly metadata: Readonly<ChunkMetadata>;
}

/** A source page before it is split. */
export interface SourceDocument {
  url: string;
  title: string;
  category: string;
  publishedAt?: string;
  text: string;
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;
}
