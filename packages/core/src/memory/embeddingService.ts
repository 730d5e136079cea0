/**
 * Embedding Service: external text → vector capability.
 *
 * Provides:
 * - EmbeddingService interface (implemented by the server's HTTP client, or a fake in tests)
 * - Cosine similarity (pure math, no dependencies)
 * - Ranking helper shared by the stores' nearest-neighbor queries
 */

// ============================================================================
// TYPES
// ============================================================================

export type Vector = Float32Array | number[];

export interface EmbeddingService {
  embed(text: string): Promise<Vector>;
  embedBatch(texts: string[]): Promise<Vector[]>;
  readonly dimension: number;
  readonly modelName: string;
}

export interface ScoredItem<T> {
  item: T;
  score: number;
}

// ============================================================================
// COSINE SIMILARITY (pure math)
// ============================================================================

/**
 * Compute cosine similarity between two vectors.
 * Returns a value between -1 and 1 (1 = identical direction), i.e. 1 − cosine distance.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

export function toNumberArray(vector: Vector): number[] {
  return Array.from(vector);
}

// ============================================================================
// NEAREST NEIGHBORS
// ============================================================================

/**
 * Score every item against the query and order by similarity, best first.
 */
export function rankBySimilarity<T>(
  queryVector: Vector,
  items: T[],
  vectorOf: (item: T) => Vector,
): ScoredItem<T>[] {
  const scored = items.map(item => ({ item, score: cosineSimilarity(queryVector, vectorOf(item)) }));
  scored.sort((a, b) => b.score - a.score);
  return scored;
}
