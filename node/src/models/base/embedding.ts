/**
 * Abstract base class for embedding models
 * Provides a consistent interface for different embedding providers
 */

import type { Embeddable } from '../types';

abstract class BaseEmbedding<CONFIG> {
  constructor(protected config: CONFIG) {}

  /**
   * Embed an array of text strings, one vector per input in the same order
   */
  abstract embedText(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  /**
   * Embed objects carrying a `text` field
   */
  async embedChunks(chunks: Embeddable[], signal?: AbortSignal): Promise<number[][]> {
    if (chunks.length === 0) {
      return [];
    }
    return this.embedText(
      chunks.map((chunk) => chunk.text),
      signal,
    );
  }
}

export default BaseEmbedding;
