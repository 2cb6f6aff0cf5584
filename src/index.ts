/**
 * linescrub - remove comments from source text, leaving literals untouched
 *
 * @packageDocumentation
 */

// Core engine
export {
  VERSION,
  Scanner,
  createScanner,
  createScanState,
  scanLine,
  SCAN_MODES,
  COMMENT_KINDS,
  detectHeader,
  detectHeaderInFile,
  classifyHeaderLine,
  CODE_KEYWORDS,
  DEFAULT_MAX_HEADER_LINES,
  DEFAULT_PREVIEW_LINES,
  Scrubber,
  scrubText,
  scrubStream,
  countEvents,
} from "./core/index.js";

export type {
  ScanMode,
  CommentKind,
  ScanState,
  CommentEvent,
  LineScanResult,
  HeaderLineKind,
  HeaderDetectorOptions,
  HeaderDecision,
  ScrubOptions,
  ScrubStreamOptions,
  ScrubStats,
  ScrubReport,
  ScrubTextResult,
} from "./core/index.js";

// Library utilities
export {
  // Errors
  ScrubError,
  ValidationError,
  InputError,
  OutputError,
  ConfigError,
  // Result utilities
  ok,
  err,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
  // Lines
  splitLines,
  readLines,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
