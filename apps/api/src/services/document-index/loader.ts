import fs from 'fs';
import { z } from 'zod';
import { DocumentChunkSchema, type DocumentChunk } from '@ledger-auditor/shared';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ChunkLoader');

/**
 * Read pre-chunked documents (the ingestion pipeline's output) from a JSON array.
 * A missing file is an empty corpus.
 */
export function loadChunkCorpus(corpusPath: string): DocumentChunk[] {
  if (!fs.existsSync(corpusPath)) {
    logger.warn(`Corpus file not found: ${corpusPath}`);
    return [];
  }
  const parsed = z.array(DocumentChunkSchema).safeParse(JSON.parse(fs.readFileSync(corpusPath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Invalid chunk corpus ${corpusPath}: ${parsed.error.message}`);
  }
  logger.info(`Loaded ${parsed.data.length} chunks from ${corpusPath}`);
  return parsed.data;
}
