import { describe, it, expect } from 'vitest';
import {
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  createEmbeddingProvider,
  tokenizeForEmbedding,
} from '../../apps/api/src/services/document-index/embeddings';
import { InMemoryVectorStore } from '../../apps/api/src/services/document-index/vector-store';

describe('Embeddings', () => {
  describe('cosineSimilarity', () => {
    it('compares direction', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1, 10);
    });

    it('returns 0 for zero or mismatched vectors', () => {
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
      expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
      expect(cosineSimilarity([], [])).toBe(0);
    });
  });

  it('tokenizes lower-cased alphanumeric runs', () => {
    expect(tokenizeForEmbedding('Q2 Revenue, up 11%!')).toEqual(['q2', 'revenue', 'up', '11']);
  });

  it('keeps non-ASCII letters inside tokens', () => {
    expect(tokenizeForEmbedding('Prüfbericht 2024')).toEqual(['prüfbericht', '2024']);
    expect(tokenizeForEmbedding('Отчёт аудита')).toEqual(['отчёт', 'аудита']);
  });

  describe('HashingEmbeddingProvider', () => {
    it('is deterministic and unit-length', async () => {
      const provider = new HashingEmbeddingProvider(64);
      const [first] = await provider.embedTexts(['vendor audit findings']);
      const [second] = await new HashingEmbeddingProvider(64).embedTexts(['vendor audit findings']);
      expect(first).toHaveLength(64);
      expect(first).toEqual(second);
      const norm = Math.sqrt(first.reduce((sum, value) => sum + value * value, 0));
      expect(norm).toBeCloseTo(1, 10);
    });

    it('ignores case and punctuation', async () => {
      const provider = new HashingEmbeddingProvider();
      const [a, b] = await provider.embedTexts(['Audit Report.', 'audit report']);
      expect(a).toEqual(b);
    });

    it('embeds non-Latin text to a non-zero vector', async () => {
      const [vector] = await new HashingEmbeddingProvider(8).embedTexts(['Отчёт аудита']);
      expect(vector.some((value) => value !== 0)).toBe(true);
    });

    it('maps text without tokens to the zero vector', async () => {
      const [vector] = await new HashingEmbeddingProvider(8).embedTexts(['...']);
      expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    });
  });

  describe('createEmbeddingProvider', () => {
    it('builds the hashing provider by default', () => {
      const provider = createEmbeddingProvider({ provider: 'hashing', model: 'unused', dimensions: 32 }, 'test-secret');
      expect(provider).toBeInstanceOf(HashingEmbeddingProvider);
    });

    it('falls back to hashing when the remote provider has no key', () => {
      const provider = createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small', dimensions: 32 }, '');
      expect(provider).toBeInstanceOf(HashingEmbeddingProvider);
    });

    it('builds the remote provider when a key is present', () => {
      const provider = createEmbeddingProvider(
        { provider: 'openai', model: 'text-embedding-3-small', dimensions: 32 },
        'test-secret'
      );
      expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
    });
  });

  describe('InMemoryVectorStore', () => {
    it('returns the nearest k, ties in insertion order', () => {
      const store = InMemoryVectorStore.from([
        [0, 1],
        [1, 0],
        [1, 0],
      ]);
      expect(store.search([1, 0], 2)).toEqual([
        { index: 1, score: 1 },
        { index: 2, score: 1 },
      ]);
    });

    it('appends without mutating the original', () => {
      const store = InMemoryVectorStore.from([[1, 0]]);
      const extended = store.append([[0, 1]]);
      expect(store.size).toBe(1);
      expect(extended.size).toBe(2);
      expect(extended.search([0, 1], 1)).toEqual([{ index: 1, score: 1 }]);
    });
  });
});
