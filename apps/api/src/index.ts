/**
 * Composition root: wires configuration, the invoice store, the document
 * index and the language model into one AuditAgent.
 */

import { getConfig, resolveDataPath, type AppConfig } from './services/config';
import { createLLMClient, type ChatModel } from './services/llm';
import {
  SqliteInvoiceStore,
  StructuredQueryResolver,
  seedInvoicesIfEmpty,
  type InvoiceStore,
} from './services/invoices';
import {
  DocumentIndex,
  createEmbeddingProvider,
  loadChunkCorpus,
  type EmbeddingProvider,
} from './services/document-index';
import { AnswerSynthesizer, AuditAgent } from './services/audit-graph';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('Runtime');

/**
 * Collaborators a caller may supply instead of the configured ones.
 * `model: null` forces the deterministic answer path.
 */
export interface RuntimeOverrides {
  store?: InvoiceStore;
  embeddings?: EmbeddingProvider;
  model?: ChatModel | null;
}

export interface AuditRuntime {
  agent: AuditAgent;
  index: DocumentIndex;
  store: InvoiceStore;
  close(): void;
}

export async function createAuditRuntime(
  config: AppConfig = getConfig(),
  overrides: RuntimeOverrides = {}
): Promise<AuditRuntime> {
  setLogLevel(config.logging.level);

  const store = overrides.store ?? new SqliteInvoiceStore(resolveDataPath(config.database.path));
  try {
    if (config.data.invoiceSeedPath) {
      await seedInvoicesIfEmpty(store, resolveDataPath(config.data.invoiceSeedPath));
    }

    const index = new DocumentIndex(overrides.embeddings ?? createEmbeddingProvider(config.embeddings));
    if (config.data.corpusPath) {
      await index.initialize(loadChunkCorpus(resolveDataPath(config.data.corpusPath)));
    }

    const model = overrides.model === undefined ? createLLMClient(config.llm) : overrides.model;
    if (!model) {
      logger.warn('LLM_API_KEY not set, answers are built from retrieved context only');
    }

    const agent = new AuditAgent({
      resolver: new StructuredQueryResolver(store),
      documents: index,
      synthesizer: new AnswerSynthesizer(model, {
        maxDocumentContextChars: config.retrieval.maxDocumentContextChars,
      }),
      topK: config.retrieval.topK,
    });

    logger.info(`Runtime ready (${await store.count()} invoices, ${index.size} chunks)`);
    return { agent, index, store, close: () => store.close() };
  } catch (error) {
    store.close();
    throw error;
  }
}

export { AuditAgent, createInitialState, GraphExecutionError } from './services/audit-graph';
export { DocumentIndex } from './services/document-index';
export { StructuredQueryResolver } from './services/invoices';
export { loadConfig, getConfig, clearConfigCache, type AppConfig } from './services/config';
