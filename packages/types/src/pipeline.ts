import type { ChunkMetadata } from "./chunk.js";

export interface ChunkPayload extends ChunkMetadata {
  text: string;
  chunkIndex: number;
  storedAt: string;
}

export interface IndexedPoint {
  id: string;
  vector: number[];
  payload: ChunkPayload;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface DocumentIngestionResult {
  documentId: string;
  chunkCount: number;
}

export type FileIngestionResult =
  | { file: string; status: "success"; chunks: number }
  | { file: string; status: "failed"; error: string; code: string };

export interface IngestionBatchSummary {
  /** Documents ingested successfully. */
  processed: number;
  failed: number;
  /** One entry per listed document, in listing order. */
  files: FileIngestionResult[];
}
