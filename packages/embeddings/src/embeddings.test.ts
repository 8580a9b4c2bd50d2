import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConfigurationError, EmbeddingError } from "@ragline/errors";
import type { EmbeddingConfig } from "@ragline/types";

const { embedMock } = vi.hoisted(() => ({ embedMock: vi.fn() }));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { embed: embedMock };
  },
}));

import { createEmbeddingProvider } from "./factory.js";
import { TeiEmbeddingProvider } from "./tei-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

const baseConfig: EmbeddingConfig = {
  provider: "tei",
  url: "http://localhost:8080/",
  model: "sentence-transformers/all-MiniLM-L6-v2",
  dimensions: 384,
  batchSize: 32,
};

describe("Embeddings", () => {
  describe("createEmbeddingProvider factory", () => {
    it("creates TeiEmbeddingProvider for provider 'tei'", () => {
      const provider = createEmbeddingProvider(baseConfig);
      expect(provider).toBeInstanceOf(TeiEmbeddingProvider);
      expect(provider.name).toBe("tei");
      expect(provider.dimensions).toBe(384);
    });

    it("creates CohereEmbeddingProvider for provider 'cohere'", () => {
      const provider = createEmbeddingProvider({
        ...baseConfig,
        provider: "cohere",
        model: "embed-v4.0",
        dimensions: 1024,
        cohereApiKey: "test-key",
      });
      expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
      expect(provider.name).toBe("cohere");
      expect(provider.dimensions).toBe(1024);
    });

    it("throws for missing cohere api key", () => {
      expect(() => createEmbeddingProvider({ ...baseConfig, provider: "cohere" })).toThrow(
        ConfigurationError,
      );
    });
  });

  describe("TeiEmbeddingProvider", () => {
    const fetchMock = vi.fn();

    beforeEach(() => {
      fetchMock.mockReset();
      vi.stubGlobal("fetch", fetchMock);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    const provider = new TeiEmbeddingProvider({
      baseUrl: "http://tei.local/",
      model: "mini",
      dimensions: 2,
      batchSize: 2,
    });

    it("embeds in batches and preserves input order", async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse([[1, 0], [0, 1]]))
        .mockResolvedValueOnce(jsonResponse([[0.6, 0.8]]));

      const result = await provider.batchEmbed(["a", "b", "c"]);

      expect(result).toEqual({
        embeddings: [[1, 0], [0, 1], [0.6, 0.8]],
        model: "mini",
        tokensUsed: 0,
        dimensions: 2,
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock).toHaveBeenNthCalledWith(1, "http://tei.local/embed", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ inputs: ["a", "b"], normalize: true, truncate: true }),
      });
      expect(fetchMock).toHaveBeenNthCalledWith(2, "http://tei.local/embed", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ inputs: ["c"], normalize: true, truncate: true }),
      });
    });

    it("embeds a single query", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([[0.6, 0.8]]));

      const result = await provider.embed("what is fairness?");

      expect(result.embeddings).toEqual([[0.6, 0.8]]);
    });

    it("makes no request for an empty batch", async () => {
      const result = await provider.batchEmbed([]);

      expect(result.embeddings).toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("raises EmbeddingError on HTTP failure", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: "overloaded" }, { status: 503, statusText: "Service Unavailable" }),
      );

      await expect(provider.embed("x")).rejects.toThrow("Embedding failed: 503 Service Unavailable");
    });

    it("raises EmbeddingError when the server is unreachable", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      const err = await provider.embed("x").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(EmbeddingError);
      expect(err).toHaveProperty("message", "Embedding server unreachable: fetch failed");
    });

    it("rejects vectors of the wrong dimension", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([[1, 0, 0]]));

      await expect(provider.embed("x")).rejects.toThrow("Expected 2-dimensional vectors, got 3");
    });

    it("rejects a vector count that does not match the inputs", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([[1, 0]]));

      await expect(provider.batchEmbed(["a", "b"])).rejects.toThrow(
        "Embedding server returned 1 vectors for 2 inputs",
      );
    });

    it("rejects malformed payloads", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [] }));

      await expect(provider.embed("x")).rejects.toThrow(EmbeddingError);
    });

    it("raises EmbeddingError on a body that is not JSON", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<html>gateway error", { status: 200 }));

      const err = await provider.embed("x").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(EmbeddingError);
      expect(err).toHaveProperty(
        "message",
        expect.stringMatching(/^Embedding server returned malformed JSON: /),
      );
    });

    it("reports health from the /health endpoint", async () => {
      fetchMock.mockResolvedValueOnce(new Response("", { status: 200 }));
      await expect(provider.healthCheck()).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledWith("http://tei.local/health");

      fetchMock.mockResolvedValueOnce(new Response("", { status: 503 }));
      await expect(provider.healthCheck()).resolves.toBe(false);

      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      await expect(provider.healthCheck()).resolves.toBe(false);
    });
  });

  describe("CohereEmbeddingProvider", () => {
    beforeEach(() => {
      embedMock.mockReset();
      embedMock.mockImplementation(async ({ texts }: { texts: string[] }) => ({
        embeddings: { float: texts.map(() => [0.1, 0.2]) },
        meta: { billedUnits: { inputTokens: texts.length } },
      }));
    });

    const provider = new CohereEmbeddingProvider({ apiKey: "test-key", dimensions: 2 });

    it("embeds documents in batches of 96 with the document input type", async () => {
      const texts = Array.from({ length: 100 }, (_, i) => `chunk ${i}`);

      const result = await provider.batchEmbed(texts);

      expect(result.embeddings).toHaveLength(100);
      expect(result.tokensUsed).toBe(100);
      expect(result.model).toBe("embed-v4.0");
      expect(embedMock).toHaveBeenCalledTimes(2);
      expect(embedMock).toHaveBeenNthCalledWith(1, {
        texts: texts.slice(0, 96),
        model: "embed-v4.0",
        inputType: "search_document",
        embeddingTypes: ["float"],
        outputDimension: 2,
      });
      expect(embedMock.mock.calls[1]?.[0]).toMatchObject({ texts: texts.slice(96) });
    });

    it("embeds queries with the query input type", async () => {
      await provider.embed("what is accountability?");

      expect(embedMock).toHaveBeenCalledWith(
        expect.objectContaining({ inputType: "search_query", texts: ["what is accountability?"] }),
      );
    });

    it("requests the default 1024-wide output when no width is configured", async () => {
      embedMock.mockResolvedValueOnce({ embeddings: { float: [new Array<number>(1024).fill(0.5)] } });
      const defaults = new CohereEmbeddingProvider({ apiKey: "test-key" });

      const result = await defaults.embed("what is transparency?");

      expect(result.embeddings[0]).toHaveLength(1024);
      expect(embedMock).toHaveBeenCalledWith(
        expect.objectContaining({ model: "embed-v4.0", outputDimension: 1024 }),
      );
    });

    it("wraps client failures in EmbeddingError", async () => {
      embedMock.mockRejectedValueOnce(new Error("invalid api token"));

      await expect(provider.embed("x")).rejects.toThrow(
        "Cohere embedding failed: invalid api token",
      );
    });

    it("rejects vectors of the wrong dimension", async () => {
      embedMock.mockResolvedValueOnce({ embeddings: { float: [[0.1, 0.2, 0.3]] } });

      await expect(provider.embed("x")).rejects.toThrow("Expected 2-dimensional vectors, got 3");
    });

    it("reports unhealthy when embedding fails", async () => {
      embedMock.mockRejectedValueOnce(new Error("down"));

      await expect(provider.healthCheck()).resolves.toBe(false);
      await expect(provider.healthCheck()).resolves.toBe(true);
    });
  });
});
