export type { Chunk, ChunkMetadata, ChunkingConfig } from "./chunk.js";
export type { SourceDocument, ParseResult } from "./document.js";
export type {
  ChunkPayload,
  IndexedPoint,
  EmbeddingResult,
  DocumentIngestionResult,
  FileIngestionResult,
  IngestionBatchSummary,
} from "./pipeline.js";
export type {
  ScoredChunk,
  RetrievalRequest,
  RetrievalContext,
  AnswerResult,
  AnswerStreamEvent,
} from "./query.js";
export type { DependencyStatus, OverallStatus, HealthStatus } from "./health.js";
export type { ApiResponse, ApiError } from "./api.js";
export type {
  NodeEnv,
  LogLevel,
  EmbeddingProviderType,
  VectorStoreType,
  AppConfig,
  ServerConfig,
  StorageConfig,
  VectorStoreConfig,
  EmbeddingConfig,
  LlmConfig,
  ChunkingSettings,
  RetrievalSettings,
  ExtractionConfig,
  AssistantConfig,
} from "./config.js";
