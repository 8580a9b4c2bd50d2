export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  /** False for programmer or deployment errors whose message must not reach clients. */
  isOperational?: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** What a client may see of an error: never its cause or stack. */
export interface PublicError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base of every error the pipeline raises on purpose. `code` is stable and
 * machine-readable; `statusCode` is the HTTP status the API answers with.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly requestId?: string;
  public readonly details?: Record<string, unknown>;

  constructor(options: AppErrorOptions) {
    const { message, cause } = options;
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.isOperational = options.isOperational ?? true;
    this.requestId = options.requestId;
    this.details = options.details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  toJSON(): PublicError {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, details: this.details };
  }
}

/**
 * Best-effort message extraction for values caught from collaborators,
 * which may throw anything.
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
