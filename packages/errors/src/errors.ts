import { AppError, type PublicError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Startup configuration is unusable. Fatal: the process should not boot. */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
  }
}

/** A collaborator could not be reached at all. */
export class ConnectivityError extends AppError {
  public readonly service: string;

  constructor(message = "Service unreachable", service: string, options?: ErrorContext) {
    super({ message, statusCode: 503, code: "CONNECTIVITY_ERROR", ...options });
    this.service = service;
  }
}

export class StorageError extends AppError {
  constructor(message = "Document storage error", options?: ErrorContext) {
    super({ message, statusCode: 502, code: "STORAGE_ERROR", ...options });
  }
}

/** Corrupt or unsupported document content. Not transient, so not retried. */
export class ExtractionError extends AppError {
  constructor(message = "Text extraction failed", options?: ErrorContext) {
    super({ message, statusCode: 422, code: "EXTRACTION_ERROR", ...options });
  }
}

export class EmbeddingError extends AppError {
  constructor(message = "Embedding failed", options?: ErrorContext) {
    super({ message, statusCode: 502, code: "EMBEDDING_ERROR", ...options });
  }
}

export class IndexError extends AppError {
  constructor(message = "Vector index operation failed", options?: ErrorContext) {
    super({ message, statusCode: 502, code: "INDEX_ERROR", ...options });
  }
}

export type GenerationErrorCode = "GENERATION_UNAVAILABLE" | "GENERATION_REJECTED";

/**
 * Generation backend failure. `GENERATION_UNAVAILABLE` covers network errors,
 * 5xx and 429 responses; `GENERATION_REJECTED` covers every other refusal.
 */
export class GenerationError extends AppError {
  constructor(
    message = "Generation failed",
    code: GenerationErrorCode = "GENERATION_UNAVAILABLE",
    options?: ErrorContext,
  ) {
    super({ message, statusCode: 502, code, ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorContext) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }

  override toJSON(): PublicError {
    return { code: this.code, message: this.message, details: this.fields };
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export type IngestionStage = "list" | "fetch" | "extract" | "chunk" | "embed" | "store";

/** Wraps the first unrecoverable failure while ingesting one document. */
export class IngestionError extends AppError {
  public readonly logicalKey: string;
  public readonly stage: IngestionStage;

  constructor(logicalKey: string, stage: IngestionStage, cause: unknown, options?: ErrorContext) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      message: `Failed to ingest ${logicalKey} at ${stage}: ${reason}`,
      statusCode: 500,
      code: "INGESTION_ERROR",
      ...options,
      cause,
      details: {
        ...options?.details,
        stage,
        causeCode: AppError.isAppError(cause) ? cause.code : undefined,
      },
    });
    this.logicalKey = logicalKey;
    this.stage = stage;
  }

  /** Code of the wrapped collaborator error, falling back to this error's own code. */
  get causeCode(): string {
    const cause = this.cause;
    return AppError.isAppError(cause) ? cause.code : this.code;
  }
}
