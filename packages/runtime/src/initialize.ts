import { ConnectivityError } from "@ragline/errors";
import type { Runtime } from "./runtime.js";

/**
 * Startup checks, run once before serving or ingesting.
 *
 * Storage and the vector index must be reachable; the collection is created
 * when missing. An unreachable generation backend only logs a warning,
 * since ingestion does not need it and it may recover.
 */
export async function initialize(runtime: Runtime): Promise<void> {
  const { config, logger } = runtime;

  if (!(await runtime.storage.healthCheck())) {
    throw new ConnectivityError(
      `Failed to connect to document storage (bucket ${config.storage.bucket})`,
      "storage",
    );
  }

  if (!(await runtime.vectorStore.healthCheck())) {
    throw new ConnectivityError(
      `Failed to connect to the vector store at ${config.vectorStore.url}`,
      "vectorStore",
    );
  }

  await runtime.vectorStore.ensureCollection(
    config.vectorStore.collection,
    runtime.embeddings.dimensions,
    "Cosine",
  );
  logger.info(
    { collection: config.vectorStore.collection, dimensions: runtime.embeddings.dimensions },
    "Vector collection ready",
  );

  if (!(await runtime.generation.healthCheck())) {
    logger.warn(
      { model: config.llm.model },
      "Generation backend probe failed, answers may fall back until it recovers",
    );
  }
}
