import type { RetrievalRequest, ScoredChunk } from "@ragline/types";
import type { IEmbeddingProvider } from "@ragline/embeddings";
import type { IVectorStore, VectorSearchResult } from "@ragline/vector-store";
import { EmbeddingError } from "@ragline/errors";
import { validateRetrievalRequest } from "./query-validator.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  /** Upper bound for topK. Default: 20 */
  maxTopK?: number;
}

/**
 * Retrieval pipeline: Validate -> Embed query -> Vector search
 *
 * Results keep the index's descending-similarity order and never exceed
 * `topK`. The collection's metric is fixed when it is created (cosine).
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  validateRetrievalRequest(request.query, request.topK, deps.maxTopK);

  const embeddingResult = await deps.embeddingProvider.embed(request.query);
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new EmbeddingError("Embedding provider returned no vector for the query");
  }

  const searchResults = await deps.vectorStore.search(deps.collectionName, {
    vector: queryVector,
    limit: request.topK,
  });

  return searchResults.slice(0, request.topK).map(toScoredChunk);
}

function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  return {
    chunkId: result.id,
    documentId: result.payload.documentId,
    filename: result.payload.filename,
    chunkIndex: result.payload.chunkIndex,
    text: result.payload.text,
    score: result.score,
  };
}
