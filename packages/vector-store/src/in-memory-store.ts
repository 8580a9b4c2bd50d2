import type { IndexedPoint } from "@ragline/types";
import { IndexError } from "@ragline/errors";
import type {
  DistanceMetric,
  IVectorStore,
  PayloadMatch,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface Collection {
  dimensions: number;
  distance: DistanceMetric;
  points: Map<string, IndexedPoint>;
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function cosineSimilarity(a: number[], b: number[]): number {
  const denominator = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
  return denominator === 0 ? 0 : dot(a, b) / denominator;
}

function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Process-local vector index with exhaustive search. Used for tests and
 * single-process development runs; contents are lost on exit.
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, Collection>();

  async ensureCollection(
    collectionName: string,
    dimensions: number,
    distance: DistanceMetric = "Cosine",
  ): Promise<void> {
    if (!this.collections.has(collectionName)) {
      this.collections.set(collectionName, { dimensions, distance, points: new Map() });
    }
  }

  async upsert(collectionName: string, points: IndexedPoint[]): Promise<void> {
    const collection = this.getCollection(collectionName);

    for (const point of points) {
      this.assertDimensions(collection, point.vector);
    }
    for (const point of points) {
      collection.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.getCollection(collectionName);
    this.assertDimensions(collection, params.vector);

    const ascending = collection.distance === "Euclid";
    const scored = [...collection.points.values()].map((point) => ({
      id: point.id,
      score: this.score(collection.distance, params.vector, point.vector),
      payload: { ...point.payload },
    }));

    const threshold = params.scoreThreshold;
    return scored
      .filter((r) =>
        threshold === undefined ? true : ascending ? r.score <= threshold : r.score >= threshold,
      )
      .sort((a, b) => (ascending ? a.score - b.score : b.score - a.score))
      .slice(0, params.limit);
  }

  async deleteByFilter(collectionName: string, match: PayloadMatch): Promise<number> {
    const collection = this.getCollection(collectionName);
    let removed = 0;

    for (const [id, point] of collection.points) {
      if (point.payload[match.key] === match.value) {
        collection.points.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of points stored in a collection (0 when it does not exist). */
  count(collectionName: string): number {
    return this.collections.get(collectionName)?.points.size ?? 0;
  }

  /** Snapshot of stored points, in insertion order. */
  points(collectionName: string): IndexedPoint[] {
    return [...(this.collections.get(collectionName)?.points.values() ?? [])];
  }

  private getCollection(collectionName: string): Collection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new IndexError(`Collection ${collectionName} does not exist`);
    }
    return collection;
  }

  private assertDimensions(collection: Collection, vector: number[]): void {
    if (vector.length !== collection.dimensions) {
      throw new IndexError(
        `Vector dimension mismatch: expected ${collection.dimensions}, got ${vector.length}`,
      );
    }
  }

  private score(distance: DistanceMetric, query: number[], vector: number[]): number {
    switch (distance) {
      case "Cosine":
        return cosineSimilarity(query, vector);
      case "Dot":
        return dot(query, vector);
      case "Euclid":
        return euclideanDistance(query, vector);
    }
  }
}
