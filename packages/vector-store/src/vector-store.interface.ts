import type { ChunkPayload, IndexedPoint } from "@ragline/types";

export type DistanceMetric = "Cosine" | "Dot" | "Euclid";

export interface VectorSearchParams {
  vector: number[];
  limit: number;
  scoreThreshold?: number;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: ChunkPayload;
}

/** Exact match on one keyword payload field. */
export interface PayloadMatch {
  key: "documentId" | "filename";
  value: string;
}

export interface IVectorStore {
  ensureCollection(collectionName: string, dimensions: number, distance?: DistanceMetric): Promise<void>;
  upsert(collectionName: string, points: IndexedPoint[]): Promise<void>;
  /** Results are ordered best match first. */
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  /** Returns the number of points removed. */
  deleteByFilter(collectionName: string, match: PayloadMatch): Promise<number>;
  healthCheck(): Promise<boolean>;
}
