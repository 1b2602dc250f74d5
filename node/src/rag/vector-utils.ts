// node/src/rag/vector-utils.ts: shared BM25-like + vector helpers for hybrid retrieval

export type Embedding = readonly number[];

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Lowercased letter/digit runs in any script, so Cyrillic text tokenizes too. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/ё/g, 'е')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/** Simple BM25-like scorer with a flat idf; scores are only compared within one candidate set. */
export function bm25LikeScore(
  queryTokens: string[],
  docTokens: string[],
  avgDocLength: number,
  k1 = 1.5,
  b = 0.75,
): number {
  if (docTokens.length === 0 || queryTokens.length === 0) return 0;

  const docLength = docTokens.length;
  const termFreq = new Map<string, number>();
  for (const t of docTokens) {
    termFreq.set(t, (termFreq.get(t) ?? 0) + 1);
  }

  let score = 0;
  for (const qt of new Set(queryTokens)) {
    const tf = termFreq.get(qt) ?? 0;
    if (tf === 0) continue;

    const idf = 1.5;
    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + (b * docLength) / Math.max(avgDocLength, 1));

    score += idf * (numerator / denominator);
  }

  return score;
}
