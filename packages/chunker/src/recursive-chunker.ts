import type { Chunk, ChunkMetadata, ChunkingConfig } from "@ragline/types";
import { ConfigurationError } from "@ragline/errors";
import type { IChunker } from "./chunker.interface.js";

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " ", ""];

const DEFAULT_CHUNK_SIZE = 1000;
const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones; the empty
 * separator cuts between characters. Sizes are measured in characters.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: readonly string[];

  constructor(config?: Partial<ChunkingConfig>) {
    this.chunkSize = config?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = config?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.separators = config?.separators ?? DEFAULT_SEPARATORS;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    if (
      !Number.isInteger(this.chunkOverlap) ||
      this.chunkOverlap < 0 ||
      this.chunkOverlap >= this.chunkSize
    ) {
      throw new ConfigurationError(
        `chunkOverlap must be a non-negative integer below chunkSize (${this.chunkSize}), got ${this.chunkOverlap}`,
      );
    }
  }

  chunk(text: string, metadata: ChunkMetadata): Chunk[] {
    return this.splitRecursive(text, this.separators).map((chunkText, index) => ({
      index,
      text: chunkText,
      metadata: { ...metadata },
    }));
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    const { separator, remaining } = this.pickSeparator(text, separators);
    const pieces = splitKeepingSeparator(text, separator);

    const results: string[] = [];
    let fitting: string[] = [];

    for (const piece of pieces) {
      if (piece.length <= this.chunkSize) {
        fitting.push(piece);
        continue;
      }

      if (fitting.length > 0) {
        results.push(...this.merge(fitting));
        fitting = [];
      }

      if (remaining.length > 0) {
        results.push(...this.splitRecursive(piece, remaining));
      } else {
        // Nothing left to split on: keep it whole rather than lose text
        const oversized = piece.trim();
        if (oversized.length > 0) {
          results.push(oversized);
        }
      }
    }

    if (fitting.length > 0) {
      results.push(...this.merge(fitting));
    }

    return results;
  }

  private pickSeparator(
    text: string,
    separators: readonly string[],
  ): { separator: string; remaining: readonly string[] } {
    for (let i = 0; i < separators.length; i++) {
      const separator = separators[i] ?? "";
      if (separator === "") {
        return { separator, remaining: [] };
      }
      if (text.includes(separator)) {
        return { separator, remaining: separators.slice(i + 1) };
      }
    }
    return { separator: separators[separators.length - 1] ?? "", remaining: [] };
  }

  /**
   * Greedily packs pieces into chunks of at most chunkSize characters,
   * carrying up to chunkOverlap characters of trailing pieces forward.
   */
  private merge(pieces: string[]): string[] {
    const chunks: string[] = [];
    const current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > this.chunkSize && current.length > 0) {
        pushTrimmed(chunks, current.join(""));

        while (total > this.chunkOverlap || (total + piece.length > this.chunkSize && total > 0)) {
          const dropped = current.shift();
          total -= dropped?.length ?? 0;
        }
      }
      current.push(piece);
      total += piece.length;
    }

    pushTrimmed(chunks, current.join(""));
    return chunks;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    return Array.from(text);
  }
  const [first = "", ...rest] = text.split(separator);
  return [first, ...rest.map((part) => separator + part)].filter((part) => part.length > 0);
}

function pushTrimmed(chunks: string[], text: string): void {
  const trimmed = text.trim();
  if (trimmed.length > 0) {
    chunks.push(trimmed);
  }
}
