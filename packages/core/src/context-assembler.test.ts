import { describe, it, expect } from "vitest";
import type { ScoredChunk } from "@ragline/types";
import { assembleContext, NO_DOCUMENTS_CONTEXT } from "./context-assembler.js";

const CHUNKS: ScoredChunk[] = [
  {
    chunkId: "chunk-1",
    documentId: "doc-1",
    filename: "eu-ai-act.pdf",
    chunkIndex: 0,
    text: "First chunk content.",
    score: 0.95,
  },
  {
    chunkId: "chunk-2",
    documentId: "doc-2",
    filename: "oecd-principles.pdf",
    chunkIndex: 4,
    text: "Second chunk content.",
    score: 0.85,
  },
];

describe("assembleContext", () => {
  it("returns the no-documents sentinel for no chunks", () => {
    expect(assembleContext([])).toBe(NO_DOCUMENTS_CONTEXT);
    expect(NO_DOCUMENTS_CONTEXT).toBe("No relevant documents found.");
  });

  it("renders a single chunk with its filename and text", () => {
    expect(assembleContext(CHUNKS.slice(0, 1))).toBe(
      "Document 1 (from eu-ai-act.pdf):\nFirst chunk content.\n",
    );
  });

  it("numbers blocks in retrieval order and separates them", () => {
    expect(assembleContext(CHUNKS)).toBe(
      "Document 1 (from eu-ai-act.pdf):\nFirst chunk content.\n" +
        "\n---\n" +
        "Document 2 (from oecd-principles.pdf):\nSecond chunk content.\n",
    );
  });
});
