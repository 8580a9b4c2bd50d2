import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createChildLogger, type Logger } from "@ragline/logger";

// Extend Express Request with the request id and its logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
    }
  }
}

export const REQUEST_ID_HEADER = "x-request-id";

const MAX_REQUEST_ID_LENGTH = 128;

function incomingRequestId(req: Request): string | undefined {
  const value = req.get(REQUEST_ID_HEADER)?.trim();
  if (!value || value.length > MAX_REQUEST_ID_LENGTH) return undefined;
  return value;
}

/**
 * Assigns every request an id (honouring a caller-supplied `x-request-id`)
 * and a child logger bound to it, and logs one line when the response finishes.
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = incomingRequestId(req) ?? randomUUID();
    const log = createChildLogger(logger, { requestId });
    const startedAt = process.hrtime.bigint();

    req.requestId = requestId;
    req.log = log;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      log.info(
        {
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs: Math.round(durationMs),
        },
        "Request completed",
      );
    });

    next();
  };
}
