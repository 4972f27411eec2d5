import type { AppConfig } from './config';
import { FileVectorStore } from './db/vectorStore';
import { EmbeddingService } from './embeddings';
import { OllamaClient } from './llm/ollama';
import type { Logger } from './logger';
import { DocumentParser } from './parsing/parser';
import { ScreeningPipeline } from './screening/pipeline';

export interface Services {
  parser: DocumentParser;
  embedder: EmbeddingService;
  store: FileVectorStore;
  llm: OllamaClient;
  pipeline: ScreeningPipeline;
}

/** Wires every component from one config; the vector store is loaded from disk. */
export async function createServices(config: AppConfig, logger: Logger): Promise<Services> {
  const parser = new DocumentParser(logger.child({ component: 'parser' }));
  const embedder = new EmbeddingService(config.embedding, logger.child({ component: 'embeddings' }));
  const store = new FileVectorStore(
    config.vectorStoreDir,
    config.embedding.dimension,
    logger.child({ component: 'vector-store' })
  );
  const llm = new OllamaClient(config.llm, logger.child({ component: 'llm' }));

  await store.setup();

  const pipeline = new ScreeningPipeline({
    parser,
    embedder,
    store,
    llm,
    logger: logger.child({ component: 'pipeline' }),
  });

  return { parser, embedder, store, llm, pipeline };
}
