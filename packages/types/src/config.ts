export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderType = "tei" | "cohere";

export type VectorStoreType = "qdrant" | "memory";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  server: ServerConfig;
  storage: StorageConfig;
  vectorStore: VectorStoreConfig;
  embedding: EmbeddingConfig;
  llm: LlmConfig;
  chunking: ChunkingSettings;
  retrieval: RetrievalSettings;
  extraction: ExtractionConfig;
  assistant: AssistantConfig;
}

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigins: string[];
}

export interface StorageConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Key prefix documents live under; stripped before deriving document ids. */
  prefix: string;
  /** Lower-case file suffixes eligible for ingestion, e.g. `.pdf`. */
  documentSuffixes: string[];
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  url: string;
  apiKey?: string;
  collection: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  url: string;
  model: string;
  dimensions: number;
  batchSize: number;
  cohereApiKey?: string;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalSettings {
  defaultTopK: number;
  maxTopK: number;
}

export interface ExtractionConfig {
  pythonPath: string;
  doclingScript: string;
}

export interface AssistantConfig {
  /** Subject area the prompts describe, e.g. "AI policy and ethics". */
  domain: string;
}
