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
} from "./scrubber.js";
