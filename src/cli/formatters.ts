import chalk from "chalk";

import type { CommentEvent, HeaderDecision, ScanMode, ScrubReport, ScrubStats } from "../core/index.js";

/**
 * Describe one removed comment
 */
export function formatEvent(event: CommentEvent): string {
  if (event.kind === "line") {
    return `- Line ${event.startLine}: Removed line comment.`;
  }
  if (event.startLine === event.endLine) {
    return `- Line ${event.startLine}: Removed block comment.`;
  }
  return `- Lines ${event.startLine}-${event.endLine}: Removed block comment.`;
}

/**
 * Totals block printed after the event list
 */
export function formatStats(stats: ScrubStats): string {
  return [
    "---",
    chalk.bold("Statistics:"),
    `- Total line comments removed: ${stats.lineComments}`,
    `- Total block comments removed: ${stats.blockComments}`,
    "---",
  ].join("\n");
}

/**
 * Full verbose report of a scrub run
 */
export function formatVerboseReport(report: ScrubReport): string {
  if (report.events.length === 0) {
    return "No comments found to remove in the processed section.";
  }

  const lines: string[] = [chalk.bold("Comments removed:")];
  for (const event of report.events) {
    lines.push(formatEvent(event));
  }
  lines.push(formatStats(report.stats));
  return lines.join("\n");
}

/**
 * One-line summary for a dry run without --verbose
 */
export function formatDryRunSummary(stats: ScrubStats): string {
  return (
    `Dry run complete. ${stats.lineComments} line comments and ${stats.blockComments} block comments ` +
    "would be removed. No output file written."
  );
}

/**
 * Announcement shown before asking whether to keep a detected header
 */
export function formatHeaderNotice(decision: HeaderDecision): string {
  return `${chalk.cyan(`Automatically detected a header with ${decision.lineCount} lines:`)}\n\n${decision.preview}\n`;
}

/**
 * Output of the detect-header command
 */
export function formatHeaderDecision(decision: HeaderDecision, json: boolean): string {
  if (json) {
    return JSON.stringify(decision, null, 2);
  }
  if (decision.lineCount === 0) {
    return chalk.yellow("No header detected.");
  }
  return `${chalk.bold(`Detected header: ${decision.lineCount} lines`)}\n\n${decision.preview}`;
}

const MODE_DESCRIPTIONS: Record<ScanMode, string> = {
  normal: "code",
  lineComment: "a line comment",
  blockComment: "a block comment",
  stringLiteral: "a string literal",
  stringEscape: "a string literal",
  charLiteral: "a character literal",
  charEscape: "a character literal",
  rawString: "a raw string literal",
};

/**
 * Human-readable name of the construct a scan mode sits in
 */
export function describeMode(mode: ScanMode): string {
  return MODE_DESCRIPTIONS[mode];
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}
