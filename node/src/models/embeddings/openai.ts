/**
 * OpenAIEmbedding: OpenAI implementation of BaseEmbedding
 */

import OpenAI from 'openai';
import BaseEmbedding from '../base/embedding';

/**
 * Configuration for OpenAI embedding model
 */
export interface OpenAIEmbeddingConfig {
  model: string; // e.g. 'text-embedding-3-small', 'text-embedding-3-large'
  apiKey?: string;
  baseURL?: string;
  batchSize?: number;
}

class OpenAIEmbedding extends BaseEmbedding<OpenAIEmbeddingConfig> {
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    super({ ...config, batchSize: config.batchSize ?? 96 });

    if (!config.apiKey) {
      throw new Error('Missing OpenAI API key. Set OPENAI_API_KEY or EMBEDDING_PROVIDER=hash');
    }

    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  async embedText(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batchSize = this.config.batchSize ?? 96;
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const response = await this.client.embeddings.create(
        { model: this.config.model, input: batch },
        { signal },
      );
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }
    return vectors;
  }
}

export default OpenAIEmbedding;
