export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  filename: string;
  chunkIndex: number;
  text: string;
  score: number;
}

export interface RetrievalRequest {
  query: string;
  topK: number;
}

export interface RetrievalContext {
  originalQuery: string;
  reformulatedQuery: string;
  chunks: ScoredChunk[];
  context: string;
  documentCount: number;
}

export interface AnswerResult {
  answer: string;
  query: string;
  reformulatedQuery: string;
  documentCount: number;
}

export type AnswerStreamEvent =
  | { type: "metadata"; query: string; reformulatedQuery: string; documentCount: number }
  | { type: "chunk"; content: string }
  | { type: "end" };
