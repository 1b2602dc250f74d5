// Deterministic pseudo-embedding: hashed bag of words, L2-normalised.
// Used for local development without an API key and in tests.

import BaseEmbedding from '../base/embedding';
import { tokenize } from '@/rag/vector-utils';

export interface HashEmbeddingConfig {
  dim: number;
}

class HashEmbedding extends BaseEmbedding<HashEmbeddingConfig> {
  constructor(config: HashEmbeddingConfig = { dim: 256 }) {
    super(config);
  }

  async embedText(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vec = new Array<number>(this.config.dim).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.config.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}

export default HashEmbedding;
