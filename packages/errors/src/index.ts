export { AppError, toErrorMessage } from "./app-error.js";
export type { AppErrorOptions, PublicError } from "./app-error.js";

export {
  ConfigurationError,
  ConnectivityError,
  StorageError,
  ExtractionError,
  EmbeddingError,
  IndexError,
  GenerationError,
  ValidationError,
  NotFoundError,
  IngestionError,
} from "./errors.js";
export type { ErrorContext, GenerationErrorCode, IngestionStage } from "./errors.js";

export { withRetry, backoffDelay, isRetryable } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";
