// Error classes
export {
  ScrubError,
  ValidationError,
  InputError,
  OutputError,
  ConfigError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { LogLevel, LogSink, Logger } from "./logger.js";

// Line handling
export { splitLines, readLines } from "./lines.js";
export { isWhitespaceOnly, trimWhitespace } from "./whitespace.js";
