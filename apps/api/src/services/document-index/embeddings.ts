/**
 * Embedding providers for the document index
 */

import OpenAI from 'openai';
import type { EmbeddingsConfig } from '../config';
import { createLogger } from '../../utils/logger';
import type { EmbeddingProvider } from './types';

const logger = createLogger('Embeddings');

/**
 * Compute cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function tokenizeForEmbedding(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Local, deterministic bag-of-words embedder (feature hashing + L2 norm).
 * Same text always yields the same vector, so index builds are reproducible.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(private dimensions = 256) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenizeForEmbedding(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

/**
 * Remote embeddings through the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAI;

  constructor(private model: string, apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts.map((text) => text.substring(0, 8000)),
    });
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

export function createEmbeddingProvider(
  config: EmbeddingsConfig,
  apiKey = process.env.EMBEDDINGS_API_KEY || process.env.LLM_API_KEY
): EmbeddingProvider {
  if (config.provider === 'openai') {
    if (apiKey) {
      return new OpenAIEmbeddingProvider(config.model, apiKey);
    }
    logger.warn('openai embeddings requested but no API key is set, using hashing embeddings');
  }
  return new HashingEmbeddingProvider(config.dimensions);
}
