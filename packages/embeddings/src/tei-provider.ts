import { z } from "zod";
import type { EmbeddingResult } from "@ragline/types";
import { EmbeddingError, toErrorMessage } from "@ragline/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_BATCH_SIZE = 32;

export interface TeiProviderConfig {
  baseUrl: string;
  /** Model served by the endpoint; reported in results only. */
  model: string;
  dimensions: number;
  batchSize?: number;
}

const embedResponseSchema = z.array(z.array(z.number()));

/**
 * Self-hosted embeddings via a Text Embeddings Inference server.
 * Vectors are requested L2-normalised so cosine and dot product agree.
 */
export class TeiEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "tei";
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(config: TeiProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      embeddings.push(...(await this.embedBatch(texts.slice(i, i + this.batchSize))));
    }

    return {
      embeddings,
      model: this.model,
      tokensUsed: 0, // TEI does not report usage
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async embedBatch(inputs: string[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ inputs, normalize: true, truncate: true }),
      });
    } catch (err) {
      throw new EmbeddingError(`Embedding server unreachable: ${toErrorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new EmbeddingError(`Embedding failed: ${response.status} ${response.statusText}`, {
        details: { status: response.status },
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new EmbeddingError(`Embedding server returned malformed JSON: ${toErrorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = embedResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingError("Embedding server returned an unexpected payload", {
        cause: parsed.error,
      });
    }

    if (parsed.data.length !== inputs.length) {
      throw new EmbeddingError(
        `Embedding server returned ${parsed.data.length} vectors for ${inputs.length} inputs`,
      );
    }
    for (const vector of parsed.data) {
      if (vector.length !== this.dimensions) {
        throw new EmbeddingError(
          `Expected ${this.dimensions}-dimensional vectors, got ${vector.length}`,
        );
      }
    }

    return parsed.data;
  }
}
