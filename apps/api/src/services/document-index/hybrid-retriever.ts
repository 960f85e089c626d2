/**
 * Hybrid document index: dense similarity + BM25 over one chunk corpus.
 *
 * Both sub-indexes live in one immutable snapshot. Mutations build a complete
 * new snapshot (BM25 always rebuilt over the full corpus) and publish it with
 * a single assignment, so a concurrent query sees either the old corpus or
 * the new one, never a mix. Mutations themselves run one at a time.
 */

import type { DocumentChunk, RetrievalResult } from '@ledger-auditor/shared';
import { createLogger, type Logger } from '../../utils/logger';
import { Bm25Index, tokenizeWhitespace } from './bm25';
import type { EmbeddingProvider, ScoredIndex } from './types';
import { InMemoryVectorStore } from './vector-store';

interface IndexSnapshot {
  readonly chunks: readonly DocumentChunk[];
  readonly vectors: InMemoryVectorStore;
  readonly lexical: Bm25Index;
}

function freezeChunk(chunk: DocumentChunk): DocumentChunk {
  return Object.freeze({ content: chunk.content, metadata: Object.freeze({ ...chunk.metadata }) });
}

function buildLexicalIndex(chunks: readonly DocumentChunk[]): Bm25Index {
  return new Bm25Index(chunks.map((chunk) => tokenizeWhitespace(chunk.content)));
}

export class DocumentIndex {
  private snapshot: IndexSnapshot | null = null;
  private mutationQueue: Promise<void> = Promise.resolve();
  private logger: Logger;

  constructor(private embeddings: EmbeddingProvider, logger?: Logger) {
    this.logger = logger ?? createLogger('DocumentIndex');
  }

  /** Number of chunks currently searchable */
  get size(): number {
    return this.snapshot?.chunks.length ?? 0;
  }

  isInitialized(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Replace the whole corpus. Zero chunks leaves an empty, uninitialized index.
   */
  initialize(chunks: DocumentChunk[]): Promise<void> {
    return this.enqueue(() => this.rebuild(chunks));
  }

  /**
   * Append chunks; behaves as `initialize` when nothing has been indexed yet
   */
  add(chunks: DocumentChunk[]): Promise<void> {
    return this.enqueue(async () => {
      const current = this.snapshot;
      if (!current) {
        await this.rebuild(chunks);
        return;
      }
      if (chunks.length === 0) return;

      const added = chunks.map(freezeChunk);
      const vectors = await this.embeddings.embedTexts(added.map((chunk) => chunk.content));
      const allChunks = [...current.chunks, ...added];
      this.snapshot = {
        chunks: allChunks,
        vectors: current.vectors.append(vectors),
        lexical: buildLexicalIndex(allChunks),
      };
      this.logger.info(`Added ${added.length} chunks (corpus size ${allChunks.length})`);
    });
  }

  /**
   * Union of the top-k dense hits and the top-k positive BM25 hits,
   * deduplicated by content (first occurrence wins), truncated to k.
   * An uninitialized index returns no results.
   */
  async hybridRetrieve(query: string, k = 5): Promise<RetrievalResult[]> {
    const snapshot = this.snapshot;
    if (!snapshot || k <= 0) {
      return [];
    }

    const vectorHits = await this.vectorSearch(snapshot, query, k);
    const lexicalHits = this.lexicalSearch(snapshot, query, k);

    const seen = new Set<string>();
    const merged: RetrievalResult[] = [];
    const candidates: RetrievalResult[] = [
      ...vectorHits.map((hit) => ({ chunk: snapshot.chunks[hit.index], signal: 'vector' as const, score: hit.score })),
      ...lexicalHits.map((hit) => ({ chunk: snapshot.chunks[hit.index], signal: 'lexical' as const, score: hit.score })),
    ];
    for (const candidate of candidates) {
      if (seen.has(candidate.chunk.content)) continue;
      seen.add(candidate.chunk.content);
      merged.push(candidate);
    }
    return merged.slice(0, k);
  }

  private async rebuild(chunks: DocumentChunk[]): Promise<void> {
    if (chunks.length === 0) {
      this.snapshot = null;
      this.logger.warn('Initialized with zero chunks; index is empty');
      return;
    }
    const frozen = chunks.map(freezeChunk);
    const vectors = await this.embeddings.embedTexts(frozen.map((chunk) => chunk.content));
    this.snapshot = {
      chunks: frozen,
      vectors: InMemoryVectorStore.from(vectors),
      lexical: buildLexicalIndex(frozen),
    };
    this.logger.info(`Indexed ${frozen.length} chunks`);
  }

  private async vectorSearch(snapshot: IndexSnapshot, query: string, k: number): Promise<ScoredIndex[]> {
    try {
      const [queryVector] = await this.embeddings.embedTexts([query]);
      if (!queryVector || queryVector.length === 0) return [];
      return snapshot.vectors.search(queryVector, k);
    } catch (error) {
      // Dense retrieval is best-effort; lexical hits still come back.
      this.logger.warn('Query embedding failed, using lexical results only:', error);
      return [];
    }
  }

  private lexicalSearch(snapshot: IndexSnapshot, query: string, k: number): ScoredIndex[] {
    const scores = snapshot.lexical.getScores(tokenizeWhitespace(query));
    return scores
      .map((score, index) => ({ index, score }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, k);
  }

  private enqueue(mutation: () => Promise<void>): Promise<void> {
    const run = this.mutationQueue.then(mutation);
    // The caller sees a failed mutation through `run`; the queue moves on.
    this.mutationQueue = run.catch((error: unknown) => {
      this.logger.error('Index mutation failed:', error);
    });
    return run;
  }
}
