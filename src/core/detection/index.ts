/**
 * Detection module - header recognition at the top of a source file
 */

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
} from "./header-detector.js";
