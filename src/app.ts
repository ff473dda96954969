/**
 * Composition root: builds long-lived clients once and wires the pipelines.
 */

import type { AppConfig } from './config.js';
import { OpenAIProvider, type LLMProvider } from './llm/index.js';
import { IngestionPipeline } from './pipeline/ingest.js';
import { QueryPipeline } from './pipeline/query.js';
import {
  AnswerSynthesizer,
  Chunker,
  Embedder,
  OpenAIEmbeddingProvider,
  createLanceStore,
  type EmbeddingProvider,
  type VectorStoreAdapter,
} from './rag/index.js';
import { RagServer } from './server/index.js';
import { FileSystemDocumentSource, type DocumentSource } from './storage/document-source.js';

/**
 * External collaborators. Anything left out is built from configuration.
 */
export interface AppDependencies {
  embeddingProvider: EmbeddingProvider;
  llm: LLMProvider;
  store: VectorStoreAdapter & { getVectorCount?: () => Promise<number> };
  source: DocumentSource;
}

export interface App {
  server: RagServer;
  queryPipeline: QueryPipeline;
  ingestionPipeline: IngestionPipeline;
}

export async function createApp(config: AppConfig, overrides: Partial<AppDependencies> = {}): Promise<App> {
  const embeddingProvider =
    overrides.embeddingProvider ??
    new OpenAIEmbeddingProvider(config.openaiApiKey, config.embeddingModel, {
      baseUrl: config.openaiBaseUrl,
      retry: config.retry,
      dimensions: config.embeddingDimensions,
    });

  const llm =
    overrides.llm ??
    new OpenAIProvider(config.openaiApiKey, config.chatModel, {
      baseUrl: config.openaiBaseUrl,
      retry: config.retry,
    });

  const store = overrides.store ?? (await createLanceStore(config.lanceDbPath, config.vectorIndex));
  const source = overrides.source ?? new FileSystemDocumentSource(config.documentsDir);

  const embedder = new Embedder(embeddingProvider, config.batchSize);

  const ingestionPipeline = new IngestionPipeline({
    source,
    chunker: new Chunker({ chunkSize: config.chunkSize, overlap: config.chunkOverlap }),
    embedder,
    store,
  });

  const queryPipeline = new QueryPipeline({
    embedder,
    store,
    synthesizer: new AnswerSynthesizer(llm),
    topK: config.topK,
  });

  const vectorCount = store.getVectorCount?.bind(store);

  const server = new RagServer({
    port: config.port,
    queryPipeline,
    ingestionPipeline,
    vectorCount,
  });

  return { server, queryPipeline, ingestionPipeline };
}

/**
 * Signal listener that stops the server and exits. A failed stop exits with code 1.
 */
export function createShutdownHandler(
  server: Pick<RagServer, 'stop'>,
  exit: (code: number) => void = (code) => process.exit(code)
): () => Promise<void> {
  return async () => {
    console.log('\n[Shutdown] Gracefully shutting down...');
    try {
      await server.stop();
      console.log('[Shutdown] Complete');
      exit(0);
    } catch (error) {
      console.error('[Shutdown] Failed to stop the server:', error);
      exit(1);
    }
  };
}
