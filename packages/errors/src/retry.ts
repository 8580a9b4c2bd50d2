import { setTimeout as sleep } from "node:timers/promises";
import { AppError } from "./app-error.js";

export interface RetryAttempt {
  /** 1-based number of the retry about to run. */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** When non-empty, only errors carrying one of these codes are retried. */
  retryableErrors?: readonly string[];
  /** Called before each retry sleep. */
  onRetry?: (info: RetryAttempt) => void;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 10_000;

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Delay before retry `attempt` (0-based):
 * min(maxDelay, baseDelay * 2^attempt) scaled by a jitter factor in [0.5, 1).
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.floor(capped * (0.5 + random() * 0.5));
}

/**
 * Aborts and 4xx {@link AppError}s are final. With a code filter, only the
 * listed codes are retried; without one, 5xx AppErrors and foreign errors
 * (network failures and the like) are.
 */
export function isRetryable(error: unknown, retryableErrors: readonly string[] = []): boolean {
  if (error instanceof Error && error.name === "AbortError") return false;

  const status = AppError.isAppError(error) ? error.statusCode : undefined;
  if (status !== undefined && status >= 400 && status < 500) return false;

  if (retryableErrors.length > 0) {
    const code = codeOf(error);
    return code !== undefined && retryableErrors.includes(code);
  }
  return status === undefined || status >= 500;
}

/** Runs `fn`, retrying retryable failures with exponential backoff. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryable(error, options.retryableErrors)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }
}
