/**
 * Core comment-stripping engine
 *
 * This module contains:
 * - scanner/   - Line-at-a-time lexical state machine
 * - detection/ - Header recognition at the top of a file
 * - scrubber/  - Whole-file driver over the scanner
 */

export const VERSION = "0.1.0";

// Scanner module
export {
  Scanner,
  createScanner,
  createScanState,
  scanLine,
  SCAN_MODES,
  COMMENT_KINDS,
  type ScanMode,
  type CommentKind,
  type ScanState,
  type CommentEvent,
  type LineScanResult,
} from "./scanner/index.js";

// Detection module
export {
  detectHeader,
  detectHeaderInFile,
  classifyHeaderLine,
  CODE_KEYWORDS,
  DEFAULT_MAX_HEADER_LINES,
  DEFAULT_PREVIEW_LINES,
  type HeaderLineKind,
  type HeaderDetectorOptions,
  type HeaderDecision,
} from "./detection/index.js";

// Scrubber module
export {
  Scrubber,
  scrubText,
  scrubStream,
  countEvents,
  type ScrubOptions,
  type ScrubStreamOptions,
  type ScrubStats,
  type ScrubReport,
  type ScrubTextResult,
} from "./scrubber/index.js";
