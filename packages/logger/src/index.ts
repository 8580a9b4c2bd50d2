export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, LoggerLevel, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactObject, REDACT_PATHS } from "./redactor.js";
