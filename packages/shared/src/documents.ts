import { z } from 'zod';

// ============ Document Chunks ============

/**
 * Free-form chunk metadata. Ingestion conventionally sets `source` (file path)
 * and `type` (extraction method: "text", "ocr", "markdown").
 */
export const ChunkMetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const DocumentChunkSchema = z.object({
  content: z.string(),
  metadata: ChunkMetadataSchema.default({}),
});

export type DocumentChunk = z.infer<typeof DocumentChunkSchema>;

/**
 * Which retrieval signal surfaced a chunk. The first signal to find a chunk wins.
 */
export type RetrievalSignal = 'vector' | 'lexical';

export interface RetrievalResult {
  chunk: DocumentChunk;
  signal: RetrievalSignal;
  score: number;
}
