import { QdrantClient } from "@qdrant/js-client-rest";
import type { IndexedPoint } from "@ragline/types";
import { IndexError, toErrorMessage } from "@ragline/errors";
import type {
  DistanceMetric,
  IVectorStore,
  PayloadMatch,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { toChunkPayload } from "./payload.js";

const BATCH_SIZE = 100;

async function indexCall<T>(operation: string, collectionName: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new IndexError(`Qdrant ${operation} on ${collectionName} failed: ${toErrorMessage(err)}`, {
      cause: err,
      details: { operation, collectionName },
    });
  }
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, points: IndexedPoint[]): Promise<void> {
    // Process in batches
    for (let i = 0; i < points.length; i += BATCH_SIZE) {
      const batch = points.slice(i, i + BATCH_SIZE);

      await indexCall("upsert", collectionName, () =>
        this.client.upsert(collectionName, {
          wait: true,
          points: batch.map((p) => ({
            id: p.id,
            vector: p.vector,
            payload: { ...p.payload },
          })),
        }),
      );
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const results = await indexCall("search", collectionName, () =>
      this.client.search(collectionName, {
        vector: params.vector,
        limit: params.limit,
        score_threshold: params.scoreThreshold,
        with_payload: true,
      }),
    );

    return results.map((r) => {
      const id = typeof r.id === "string" ? r.id : String(r.id);
      return { id, score: r.score, payload: toChunkPayload(id, r.payload) };
    });
  }

  async deleteByFilter(collectionName: string, match: PayloadMatch): Promise<number> {
    const filter = { must: [{ key: match.key, match: { value: match.value } }] };

    const { count } = await indexCall("count", collectionName, () =>
      this.client.count(collectionName, { filter, exact: true }),
    );
    if (count === 0) {
      return 0;
    }

    await indexCall("delete", collectionName, () =>
      this.client.delete(collectionName, { wait: true, filter }),
    );
    return count;
  }

  async ensureCollection(
    collectionName: string,
    dimensions: number,
    distance: DistanceMetric = "Cosine",
  ): Promise<void> {
    const collections = await indexCall("getCollections", collectionName, () =>
      this.client.getCollections(),
    );
    const exists = collections.collections.some((c) => c.name === collectionName);

    if (!exists) {
      await indexCall("createCollection", collectionName, async () => {
        await this.client.createCollection(collectionName, {
          vectors: {
            size: dimensions,
            distance,
          },
        });

        // Re-ingestion deletes by documentId
        await this.client.createPayloadIndex(collectionName, {
          field_name: "documentId",
          field_schema: "keyword",
          wait: true,
        });
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
