import type { EmbeddingResult } from "@ragline/types";

/**
 * Maps text to fixed-length vectors. The same provider and model must embed
 * both the indexed chunks and incoming queries.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  /** Length of every returned vector; sizes the vector collection. */
  readonly dimensions: number;

  embed(text: string): Promise<EmbeddingResult>;
  /** One vector per input, in input order. Batching against the backend is internal. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
