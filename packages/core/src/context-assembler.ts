import type { ScoredChunk } from "@ragline/types";

export const NO_DOCUMENTS_CONTEXT = "No relevant documents found.";

const BLOCK_DELIMITER = "\n---\n";

/**
 * Renders retrieved chunks as numbered, attributed blocks in retrieval order.
 * Never returns an empty string, so the answer prompt always has context.
 */
export function assembleContext(chunks: ScoredChunk[]): string {
  if (chunks.length === 0) return NO_DOCUMENTS_CONTEXT;

  const blocks = chunks.map(
    (chunk, i) => `Document ${String(i + 1)} (from ${chunk.filename}):\n${chunk.text}\n`,
  );

  return blocks.join(BLOCK_DELIMITER);
}
