export type { EmbeddingProvider, ScoredIndex } from './types';
export {
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  cosineSimilarity,
  tokenizeForEmbedding,
} from './embeddings';
export { Bm25Index, tokenizeWhitespace, type Bm25Params } from './bm25';
export { InMemoryVectorStore } from './vector-store';
export { DocumentIndex } from './hybrid-retriever';
export { loadChunkCorpus } from './loader';
