import type { Chunk, ChunkMetadata } from "@ragline/types";

export interface IChunker {
  readonly strategy: string;
  chunk(text: string, metadata: ChunkMetadata): Chunk[];
}
