import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@ragline/types";
import { EmbeddingError, toErrorMessage } from "@ragline/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_query" | "search_document";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/**
 * Hosted embeddings. Queries and documents are embedded with their
 * respective input types, as Cohere's retrieval models expect.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedAll(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2
        .embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
          outputDimension: this.dimensions,
        })
        .catch((err: unknown) => {
          throw new EmbeddingError(`Cohere embedding failed: ${toErrorMessage(err)}`, { cause: err });
        });

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new EmbeddingError(`Cohere returned ${vectors.length} vectors for ${batch.length} inputs`);
      }
      const wrongSize = vectors.find((v) => v.length !== this.dimensions);
      if (wrongSize) {
        throw new EmbeddingError(
          `Expected ${this.dimensions}-dimensional vectors, got ${wrongSize.length}`,
        );
      }
      allEmbeddings.push(...vectors);

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
