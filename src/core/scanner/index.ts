export { Scanner, createScanner, createScanState, scanLine } from "./scanner.js";

export {
  SCAN_MODES,
  COMMENT_KINDS,
  type ScanMode,
  type CommentKind,
  type ScanState,
  type CommentEvent,
  type LineScanResult,
} from "./types.js";
