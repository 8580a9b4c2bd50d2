import type {
  ChunkMetadata,
  DocumentIngestionResult,
  FileIngestionResult,
  IndexedPoint,
  IngestionBatchSummary,
} from "@ragline/types";
import type { IChunker } from "@ragline/chunker";
import type { IEmbeddingProvider } from "@ragline/embeddings";
import type { ParserRegistry } from "@ragline/parser";
import type { IDocumentStorage } from "@ragline/storage";
import type { IVectorStore } from "@ragline/vector-store";
import type { Logger } from "@ragline/logger";
import { EmbeddingError, IngestionError, type IngestionStage } from "@ragline/errors";
import { chunkId, documentId, filenameFromKey } from "@ragline/identity";

export const INGESTION_CANCELLED = "INGESTION_CANCELLED";

export interface IngestionPipelineDependencies {
  storage: IDocumentStorage;
  parsers: ParserRegistry;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  /** Storage prefix stripped from keys before deriving document ids. */
  storagePrefix: string;
  logger: Logger;
  now?: () => Date;
}

export interface IngestAllOptions {
  /** Narrows the listing below the configured storage prefix. */
  prefix?: string;
  /** Documents processed at once. Default: 1 (sequential) */
  concurrency?: number;
  /** Stops new documents from starting; in-flight ones run to completion. */
  signal?: AbortSignal;
}

/**
 * Ingestion pipeline: Delete -> Fetch -> Extract -> Chunk -> Embed -> Store
 *
 * Re-ingesting a document replaces its chunks: existing points are removed
 * by document id before the fresh ones are written under deterministic ids.
 * The delete and the upsert are separate calls; a crash between them leaves
 * the document absent until the next run.
 */
export class IngestionPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionPipelineDependencies) {
    this.logger = deps.logger.child({ component: "ingestion" });
    this.now = deps.now ?? (() => new Date());
  }

  async ingestOne(key: string): Promise<DocumentIngestionResult> {
    const docId = documentId(key, this.deps.storagePrefix);
    const log = this.logger.child({ key, documentId: docId });

    await this.deleteExisting(docId, log);

    const content = await this.stage(key, "fetch", () => this.deps.storage.fetch(key));
    const parsed = await this.stage(key, "extract", () => this.deps.parsers.extract(content, key));

    const metadata: ChunkMetadata = {
      filename: filenameFromKey(key),
      documentId: docId,
      fileSize: content.byteLength,
      processedAt: this.now().toISOString(),
    };
    const chunks = await this.stage(key, "chunk", async () =>
      this.deps.chunker.chunk(parsed.text, metadata),
    );

    if (chunks.length === 0) {
      log.warn("No chunks produced, nothing to index");
      return { documentId: docId, chunkCount: 0 };
    }

    const embeddings = await this.stage(key, "embed", async () => {
      const result = await this.deps.embeddingProvider.batchEmbed(chunks.map((c) => c.text));
      if (result.embeddings.length !== chunks.length) {
        const received = result.embeddings.length;
        throw new EmbeddingError(
          `Expected ${String(chunks.length)} embeddings, received ${String(received)}`,
        );
      }
      return result.embeddings;
    });

    const storedAt = this.now().toISOString();
    const points: IndexedPoint[] = chunks.map((chunk, i) => ({
      id: chunkId(docId, chunk.index),
      vector: embeddings[i] ?? [],
      payload: {
        ...chunk.metadata,
        text: chunk.text,
        chunkIndex: chunk.index,
        storedAt,
      },
    }));

    await this.stage(key, "store", () =>
      this.deps.vectorStore.upsert(this.deps.collectionName, points),
    );

    log.info({ chunkCount: points.length }, "Document ingested");
    return { documentId: docId, chunkCount: points.length };
  }

  async ingestAll(options: IngestAllOptions = {}): Promise<IngestionBatchSummary> {
    const { prefix, signal } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const scope = `${this.deps.storagePrefix}${prefix ?? ""}` || "/";

    const keys = await this.stage(scope, "list", () => this.deps.storage.list(prefix));
    if (keys.length === 0) {
      this.logger.info({ scope }, "No documents found");
      return { processed: 0, failed: 0, files: [] };
    }

    this.logger.info({ scope, documents: keys.length, concurrency }, "Starting ingestion");

    const files: (FileIngestionResult | undefined)[] = [];
    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < keys.length && !signal?.aborted) {
        const index = cursor++;
        const key = keys[index];
        if (key !== undefined) {
          files[index] = await this.ingestRecorded(key);
        }
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, keys.length) }, worker));

    const results = keys.map(
      (key, i): FileIngestionResult =>
        files[i] ?? {
          file: key,
          status: "failed",
          error: "Ingestion cancelled before this document started",
          code: INGESTION_CANCELLED,
        },
    );

    const processed = results.filter((r) => r.status === "success").length;
    const summary: IngestionBatchSummary = {
      processed,
      failed: results.length - processed,
      files: results,
    };

    this.logger.info(
      { processed: summary.processed, failed: summary.failed, cancelled: signal?.aborted ?? false },
      "Ingestion complete",
    );
    return summary;
  }

  private async ingestRecorded(key: string): Promise<FileIngestionResult> {
    try {
      const result = await this.ingestOne(key);
      return { file: key, status: "success", chunks: result.chunkCount };
    } catch (err) {
      const failure =
        err instanceof IngestionError ? err : new IngestionError(key, "store", err);
      this.logger.error({ err: failure, key, stage: failure.stage }, "Document ingestion failed");
      return { file: key, status: "failed", error: failure.message, code: failure.causeCode };
    }
  }

  private async deleteExisting(docId: string, log: Logger): Promise<void> {
    try {
      const removed = await this.deps.vectorStore.deleteByFilter(this.deps.collectionName, {
        key: "documentId",
        value: docId,
      });
      if (removed > 0) {
        log.info({ removed }, "Removed previously indexed chunks");
      }
    } catch (err) {
      log.warn({ err }, "Failed to delete existing chunks, continuing with ingestion");
    }
  }

  private async stage<T>(key: string, stage: IngestionStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new IngestionError(key, stage, err);
    }
  }
}
