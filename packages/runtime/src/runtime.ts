import type { AppConfig } from "@ragline/types";
import { RecursiveChunker, type IChunker } from "@ragline/chunker";
import { AnswerService, IngestionPipeline } from "@ragline/core";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@ragline/embeddings";
import { ChatCompletionsBackend, type IGenerationBackend } from "@ragline/generation";
import { createChildLogger, type Logger } from "@ragline/logger";
import { DoclingParser, ParserRegistry, TextParser } from "@ragline/parser";
import { S3DocumentStorage, type IDocumentStorage } from "@ragline/storage";
import { createVectorStore, type IVectorStore } from "@ragline/vector-store";

/**
 * Every collaborator, built once per process. Nothing here is a module-level
 * singleton: entry points create a runtime at boot and pass it down.
 */
export interface Runtime {
  config: AppConfig;
  logger: Logger;
  storage: IDocumentStorage;
  vectorStore: IVectorStore;
  embeddings: IEmbeddingProvider;
  generation: IGenerationBackend;
  parsers: ParserRegistry;
  chunker: IChunker;
  answerService: AnswerService;
  ingestionPipeline: IngestionPipeline;
}

/** Adapters to use instead of the configured ones (tests, local runs). */
export type RuntimeOverrides = Partial<
  Pick<Runtime, "storage" | "vectorStore" | "embeddings" | "generation" | "parsers">
>;

export function createRuntime(
  config: AppConfig,
  logger: Logger,
  overrides: RuntimeOverrides = {},
): Runtime {
  const storage = overrides.storage ?? new S3DocumentStorage(config.storage);
  const vectorStore = overrides.vectorStore ?? createVectorStore(config.vectorStore);
  const embeddings = overrides.embeddings ?? createEmbeddingProvider(config.embedding);
  const generation =
    overrides.generation ??
    new ChatCompletionsBackend(config.llm, createChildLogger(logger, { component: "generation" }));
  const parsers =
    overrides.parsers ??
    new ParserRegistry([
      new TextParser(),
      new DoclingParser({
        pythonPath: config.extraction.pythonPath,
        scriptPath: config.extraction.doclingScript,
      }),
    ]);
  const chunker = new RecursiveChunker(config.chunking);

  const answerService = new AnswerService({
    generation,
    embeddingProvider: embeddings,
    vectorStore,
    collectionName: config.vectorStore.collection,
    domain: config.assistant.domain,
    maxTopK: config.retrieval.maxTopK,
    logger: createChildLogger(logger, { component: "answer" }),
  });

  const ingestionPipeline = new IngestionPipeline({
    storage,
    parsers,
    chunker,
    embeddingProvider: embeddings,
    vectorStore,
    collectionName: config.vectorStore.collection,
    storagePrefix: config.storage.prefix,
    logger,
  });

  return {
    config,
    logger,
    storage,
    vectorStore,
    embeddings,
    generation,
    parsers,
    chunker,
    answerService,
    ingestionPipeline,
  };
}
