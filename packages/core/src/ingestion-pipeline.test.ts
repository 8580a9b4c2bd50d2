import { describe, it, expect, vi, beforeEach } from "vitest";
import type { EmbeddingResult } from "@ragline/types";
import type { IDocumentStorage } from "@ragline/storage";
import type { IEmbeddingProvider } from "@ragline/embeddings";
import { IndexError, IngestionError, StorageError } from "@ragline/errors";
import { RecursiveChunker } from "@ragline/chunker";
import { ParserRegistry, TextParser } from "@ragline/parser";
import { InMemoryVectorStore } from "@ragline/vector-store";
import { chunkId, documentId } from "@ragline/identity";
import { createLogger } from "@ragline/logger";
import { IngestionPipeline, INGESTION_CANCELLED } from "./ingestion-pipeline.js";

const COLLECTION = "documents";
const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
const encoder = new TextEncoder();

const THREE_PARAGRAPHS =
  "Alpha paragraph one.\n\nBeta paragraph two.\n\nGamma paragraph three.";

class FakeStorage implements IDocumentStorage {
  readonly documents = new Map<string, Uint8Array>();
  fetchDelays = new Map<string, number>();

  put(key: string, content: string | Uint8Array): void {
    this.documents.set(key, typeof content === "string" ? encoder.encode(content) : content);
  }

  async list(prefix = ""): Promise<string[]> {
    return [...this.documents.keys()].filter((key) => key.startsWith(prefix));
  }

  async fetch(key: string): Promise<Uint8Array> {
    const delay = this.fetchDelays.get(key);
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const content = this.documents.get(key);
    if (!content) throw new StorageError(`Failed to download ${key}: NoSuchKey`);
    return content;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function vectorFor(text: string): number[] {
  return [text.length, (text.match(/a/g) ?? []).length + 1, 1];
}

class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions = 3;

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return { embeddings: texts.map(vectorFor), model: "fake", tokensUsed: 0, dimensions: 3 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

describe("IngestionPipeline", () => {
  let storage: FakeStorage;
  let embeddings: FakeEmbeddingProvider;
  let vectorStore: InMemoryVectorStore;
  let pipeline: IngestionPipeline;

  beforeEach(async () => {
    storage = new FakeStorage();
    embeddings = new FakeEmbeddingProvider();
    vectorStore = new InMemoryVectorStore();
    await vectorStore.ensureCollection(COLLECTION, 3, "Cosine");

    pipeline = new IngestionPipeline({
      storage,
      parsers: new ParserRegistry([new TextParser()]),
      chunker: new RecursiveChunker({ chunkSize: 40, chunkOverlap: 0 }),
      embeddingProvider: embeddings,
      vectorStore,
      collectionName: COLLECTION,
      storagePrefix: "corpus/",
      logger: createLogger({ level: "silent" }),
      now: () => FIXED_NOW,
    });
  });

  describe("ingestOne", () => {
    it("indexes every chunk under a deterministic id with its payload", async () => {
      storage.put("corpus/policies/charter.txt", THREE_PARAGRAPHS);
      const docId = documentId("policies/charter.txt");

      const result = await pipeline.ingestOne("corpus/policies/charter.txt");

      expect(result).toEqual({ documentId: docId, chunkCount: 3 });
      const points = vectorStore.points(COLLECTION);
      expect(points.map((p) => p.id)).toEqual([0, 1, 2].map((i) => chunkId(docId, i)));
      expect(points.map((p) => p.payload.text)).toEqual([
        "Alpha paragraph one.",
        "Beta paragraph two.",
        "Gamma paragraph three.",
      ]);
      expect(points[1]?.payload).toEqual({
        filename: "charter.txt",
        documentId: docId,
        fileSize: THREE_PARAGRAPHS.length,
        processedAt: "2026-03-01T12:00:00.000Z",
        text: "Beta paragraph two.",
        chunkIndex: 1,
        storedAt: "2026-03-01T12:00:00.000Z",
      });
      expect(points[1]?.vector).toEqual(vectorFor("Beta paragraph two."));
    });

    it("is idempotent when the same document is ingested twice", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);

      await pipeline.ingestOne("corpus/charter.txt");
      const firstIds = vectorStore.points(COLLECTION).map((p) => p.id);
      await pipeline.ingestOne("corpus/charter.txt");

      expect(vectorStore.count(COLLECTION)).toBe(3);
      expect(vectorStore.points(COLLECTION).map((p) => p.id).sort()).toEqual([...firstIds].sort());
    });

    it("removes chunks that a shorter revision no longer produces", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);
      await pipeline.ingestOne("corpus/charter.txt");

      storage.put("corpus/charter.txt", "Only one paragraph now.");
      const result = await pipeline.ingestOne("corpus/charter.txt");

      expect(result.chunkCount).toBe(1);
      expect(vectorStore.points(COLLECTION).map((p) => p.payload.text)).toEqual([
        "Only one paragraph now.",
      ]);
    });

    it("leaves other documents untouched", async () => {
      storage.put("corpus/a.txt", "First document.");
      storage.put("corpus/b.txt", "Second document.");

      await pipeline.ingestOne("corpus/a.txt");
      await pipeline.ingestOne("corpus/b.txt");
      await pipeline.ingestOne("corpus/a.txt");

      expect(vectorStore.count(COLLECTION)).toBe(2);
    });

    it("deletes before fetching, and fetches before embedding and storing", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);
      const deleteSpy = vi.spyOn(vectorStore, "deleteByFilter");
      const fetchSpy = vi.spyOn(storage, "fetch");
      const embedSpy = vi.spyOn(embeddings, "batchEmbed");
      const upsertSpy = vi.spyOn(vectorStore, "upsert");

      await pipeline.ingestOne("corpus/charter.txt");

      const order = [deleteSpy, fetchSpy, embedSpy, upsertSpy].map(
        (spy) => spy.mock.invocationCallOrder[0] ?? Number.POSITIVE_INFINITY,
      );
      expect(order).toEqual([...order].sort((a, b) => a - b));
      expect(deleteSpy).toHaveBeenCalledWith(COLLECTION, {
        key: "documentId",
        value: documentId("charter.txt"),
      });
      expect(embedSpy).toHaveBeenCalledTimes(1);
      expect(upsertSpy).toHaveBeenCalledTimes(1);
    });

    it("continues when the dedup delete fails", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);
      vi.spyOn(vectorStore, "deleteByFilter").mockRejectedValue(new IndexError("index busy"));

      await expect(pipeline.ingestOne("corpus/charter.txt")).resolves.toMatchObject({
        chunkCount: 3,
      });
      expect(vectorStore.count(COLLECTION)).toBe(3);
    });

    it("reports zero chunks for a blank document without calling the embedder", async () => {
      storage.put("corpus/blank.txt", "  \n\n \t ");
      const embedSpy = vi.spyOn(embeddings, "batchEmbed");

      await expect(pipeline.ingestOne("corpus/blank.txt")).resolves.toEqual({
        documentId: documentId("blank.txt"),
        chunkCount: 0,
      });
      expect(embedSpy).not.toHaveBeenCalled();
      expect(vectorStore.count(COLLECTION)).toBe(0);
    });

    it("wraps extraction failures with the key and stage", async () => {
      storage.put("corpus/broken.txt", new Uint8Array([0xff, 0xfe, 0xfd]));

      const err = await pipeline.ingestOne("corpus/broken.txt").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(IngestionError);
      expect(err).toMatchObject({
        logicalKey: "corpus/broken.txt",
        stage: "extract",
        causeCode: "EXTRACTION_ERROR",
        message: "Failed to ingest corpus/broken.txt at extract: Document is not valid UTF-8 text",
      });
    });

    it("rejects unsupported document types at the extract stage", async () => {
      storage.put("corpus/archive.zip", "PK");

      await expect(pipeline.ingestOne("corpus/archive.zip")).rejects.toMatchObject({
        stage: "extract",
        causeCode: "EXTRACTION_ERROR",
      });
    });

    it("fails at the embed stage when the provider returns too few vectors", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);
      vi.spyOn(embeddings, "batchEmbed").mockResolvedValue({
        embeddings: [[1, 1, 1]],
        model: "fake",
        tokensUsed: 0,
        dimensions: 3,
      });

      await expect(pipeline.ingestOne("corpus/charter.txt")).rejects.toMatchObject({
        stage: "embed",
        causeCode: "EMBEDDING_ERROR",
        message: "Failed to ingest corpus/charter.txt at embed: Expected 3 embeddings, received 1",
      });
      expect(vectorStore.count(COLLECTION)).toBe(0);
    });

    it("fails at the store stage when the upsert is rejected", async () => {
      storage.put("corpus/charter.txt", THREE_PARAGRAPHS);
      vi.spyOn(vectorStore, "upsert").mockRejectedValue(new IndexError("disk full"));

      await expect(pipeline.ingestOne("corpus/charter.txt")).rejects.toMatchObject({
        stage: "store",
        causeCode: "INDEX_ERROR",
      });
    });

    it("fails at the fetch stage when the object is missing", async () => {
      await expect(pipeline.ingestOne("corpus/missing.txt")).rejects.toMatchObject({
        stage: "fetch",
        causeCode: "STORAGE_ERROR",
      });
    });
  });

  describe("ingestAll", () => {
    function putFive(): string[] {
      const keys = [1, 2, 3, 4, 5].map((n) => `corpus/doc-${String(n)}.txt`);
      for (const key of keys) storage.put(key, `Contents of ${key}.`);
      return keys;
    }

    it("isolates a failing document from the rest of the batch", async () => {
      const keys = putFive();
      storage.put("corpus/doc-3.txt", new Uint8Array([0xff, 0xfe, 0xfd]));

      const summary = await pipeline.ingestAll();

      expect(summary.processed).toBe(4);
      expect(summary.failed).toBe(1);
      expect(summary.files.map((f) => f.file)).toEqual(keys);
      expect(summary.files[2]).toEqual({
        file: "corpus/doc-3.txt",
        status: "failed",
        error: "Failed to ingest corpus/doc-3.txt at extract: Document is not valid UTF-8 text",
        code: "EXTRACTION_ERROR",
      });
      expect(summary.files[0]).toEqual({ file: "corpus/doc-1.txt", status: "success", chunks: 1 });

      const indexed = new Set(vectorStore.points(COLLECTION).map((p) => p.payload.documentId));
      expect(indexed).toEqual(
        new Set(["doc-1.txt", "doc-2.txt", "doc-4.txt", "doc-5.txt"].map((k) => documentId(k))),
      );
    });

    it("returns an empty summary when nothing is listed", async () => {
      await expect(pipeline.ingestAll()).resolves.toEqual({ processed: 0, failed: 0, files: [] });
    });

    it("passes the listing prefix through to storage", async () => {
      storage.put("corpus/a/one.txt", "One.");
      storage.put("corpus/b/two.txt", "Two.");
      const listSpy = vi.spyOn(storage, "list").mockResolvedValue(["corpus/b/two.txt"]);

      const summary = await pipeline.ingestAll({ prefix: "b/" });

      expect(listSpy).toHaveBeenCalledWith("b/");
      expect(summary.files).toEqual([{ file: "corpus/b/two.txt", status: "success", chunks: 1 }]);
    });

    it("throws when the listing itself fails", async () => {
      vi.spyOn(storage, "list").mockRejectedValue(new StorageError("bucket not found"));

      const err = await pipeline.ingestAll().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(IngestionError);
      expect(err).toMatchObject({ stage: "list", causeCode: "STORAGE_ERROR" });
    });

    it("keeps listing order when documents finish out of order", async () => {
      const keys = putFive();
      keys.forEach((key, i) => storage.fetchDelays.set(key, (keys.length - i) * 5));

      const summary = await pipeline.ingestAll({ concurrency: 3 });

      expect(summary.processed).toBe(5);
      expect(summary.files.map((f) => f.file)).toEqual(keys);
    });

    it("starts no new documents after the signal aborts", async () => {
      const keys = putFive();
      const controller = new AbortController();
      const realFetch = storage.fetch.bind(storage);
      vi.spyOn(storage, "fetch").mockImplementation(async (key) => {
        if (key === "corpus/doc-2.txt") controller.abort();
        return realFetch(key);
      });

      const summary = await pipeline.ingestAll({ signal: controller.signal });

      expect(summary.processed).toBe(2);
      expect(summary.failed).toBe(3);
      expect(summary.files.slice(2)).toEqual(
        keys.slice(2).map((file) => ({
          file,
          status: "failed",
          error: "Ingestion cancelled before this document started",
          code: INGESTION_CANCELLED,
        })),
      );
    });
  });
});
