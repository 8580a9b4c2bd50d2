export interface ChunkMetadata {
  filename: string;
  documentId: string;
  /** Size of the source document in bytes. */
  fileSize: number;
  /** ISO-8601 timestamp of the ingestion run that produced the chunk. */
  processedAt: string;
}

export interface Chunk {
  readonly index: number;
  readonly text: string;
  readonly metadata: Readonly<ChunkMetadata>;
}

export interface ChunkingConfig {
  /** Maximum chunk length in characters. */
  chunkSize: number;
  /** Characters of the previous chunk repeated at the start of the next one. */
  chunkOverlap: number;
  separators?: string[];
}
