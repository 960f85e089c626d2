import { cosineSimilarity } from './embeddings';
import type { ScoredIndex } from './types';

/**
 * Immutable in-memory dense index. `append` returns a new store.
 */
export class InMemoryVectorStore {
  private constructor(private readonly vectors: readonly number[][]) {}

  static from(vectors: number[][]): InMemoryVectorStore {
    return new InMemoryVectorStore([...vectors]);
  }

  get size(): number {
    return this.vectors.length;
  }

  append(vectors: number[][]): InMemoryVectorStore {
    return new InMemoryVectorStore([...this.vectors, ...vectors]);
  }

  /**
   * Nearest `k` entries by cosine similarity; ties keep insertion order
   */
  search(query: number[], k: number): ScoredIndex[] {
    return this.vectors
      .map((vector, index) => ({ index, score: cosineSimilarity(query, vector) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, Math.max(0, k));
  }
}
