import type { EmbeddingConfig } from "@ragline/types";
import { ConfigurationError } from "@ragline/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { TeiEmbeddingProvider } from "./tei-provider.js";

export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ConfigurationError("COHERE_API_KEY is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.model,
        dimensions: config.dimensions,
      });
    case "tei":
      return new TeiEmbeddingProvider({
        baseUrl: config.url,
        model: config.model,
        dimensions: config.dimensions,
        batchSize: config.batchSize,
      });
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
