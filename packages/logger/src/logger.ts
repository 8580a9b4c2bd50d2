/**
 * Pino loggers for the API and the ingestion CLI.
 *
 * Lines are JSON with ISO timestamps unless pretty output is on (the default
 * under NODE_ENV=development). Secret-bearing paths are censored.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export type LoggerLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: LoggerLevel;
  /** Bound as `service` on every line. */
  service?: string;
  /** Force pretty output on or off; follows NODE_ENV when omitted. */
  pretty?: boolean;
  /** Write JSON lines here instead of stdout. Pretty output is skipped. */
  destination?: DestinationStream;
}

const REDACTED = "[REDACTED]";

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function prettyTransport(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? (isDevelopment() ? "debug" : "info");
  const pretty = options.destination === undefined && (options.pretty ?? isDevelopment());

  const loggerOptions: pino.LoggerOptions = {
    level,
    base: { service: options.service ?? "ragline" },
    redact: { paths: REDACT_PATHS, censor: REDACTED },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    ...(pretty ? { transport: prettyTransport() } : {}),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/** Child logger carrying scoped bindings such as `requestId` or `component`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
