import type { VectorStoreConfig } from "@ragline/types";
import { ConfigurationError } from "@ragline/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export type {
  IVectorStore,
  DistanceMetric,
  VectorSearchParams,
  VectorSearchResult,
  PayloadMatch,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./in-memory-store.js";

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.url) {
        throw new ConfigurationError("QDRANT_URL is required for the Qdrant vector store");
      }
      return new QdrantVectorStore(config.url, config.apiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new ConfigurationError(`Unknown vector store type: ${String(config.type)}`);
  }
}
