import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from "express";
import type { ApiResponse } from "@ragline/types";
import { AppError, type PublicError } from "@ragline/errors";
import type { Logger } from "@ragline/logger";

function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

function sendError(req: Request, res: Response, status: number, error: PublicError): void {
  const body: ApiResponse = {
    success: false,
    error: { ...error, requestId: getRequestId(req) },
  };
  res.status(status).json(body);
}

/** Wraps an async route so rejections reach the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    sendError(req, res, 404, {
      code: "NOT_FOUND",
      message: `Route ${req.method} ${req.path} not found`,
    });
  };
}

/** express.json() rejects unparseable bodies with a SyntaxError carrying the raw body. */
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Renders errors as `{ success: false, error: { code, message, requestId } }`.
 * Operational {@link AppError}s keep their status and message; anything else
 * is logged and hidden behind a generic 500.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    const log = req.log ?? logger;

    if (res.headersSent) {
      log.error({ err }, "Error after response started");
      next(err);
      return;
    }

    if (err instanceof AppError && err.isOperational) {
      if (err.statusCode >= 500) {
        log.error({ err }, "Request failed");
      } else {
        log.warn({ code: err.code, message: err.message }, "Request rejected");
      }
      sendError(req, res, err.statusCode, err.toJSON());
      return;
    }

    if (isMalformedBody(err)) {
      sendError(req, res, 400, { code: "VALIDATION_ERROR", message: "Malformed JSON body" });
      return;
    }

    log.error({ err }, "Unhandled error");
    sendError(req, res, 500, { code: "INTERNAL_ERROR", message: "Internal server error" });
  };
}
