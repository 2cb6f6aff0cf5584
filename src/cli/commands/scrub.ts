/**
 * Scrub command - Remove comments from a source file
 */

import { createReadStream, statSync } from "fs";
import { open } from "fs/promises";
import { resolve } from "path";

import ora from "ora";

import type { Command } from "commander";
import type { Writable } from "stream";

import { detectHeaderInFile, scrubStream } from "../../core/index.js";
import { InputError, OutputError, ScrubError } from "../../lib/errors.js";
import { logger } from "../../lib/index.js";
import { err, ok, tryCatchAsync } from "../../lib/result.js";
import { loadConfig, resolveSettings } from "../config.js";
import {
  describeMode,
  formatDryRunSummary,
  formatError,
  formatHeaderNotice,
  formatVerboseReport,
} from "../formatters.js";
import { askYesNo } from "../prompt.js";
import { defaultStreams, writeLine } from "../shared.js";

import type { ScrubReport } from "../../core/index.js";
import type { Result } from "../../lib/result.js";
import type { Settings } from "../config.js";
import type { CommandStreams } from "../shared.js";

export const HEADER_QUESTION = "Should this section be treated as a header (preserve comments)?";

export interface ScrubCommandOptions {
  headerLines?: string;
  output?: string;
  verbose?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  detect?: boolean;
  config?: string;
  quiet?: boolean;
}

/**
 * Input must exist and be a regular file
 */
export function checkInputFile(inputPath: string, displayName: string): Result<void, InputError> {
  const stats = statSync(inputPath, { throwIfNoEntry: false });
  if (stats === undefined) {
    return err(new InputError(`Input file '${displayName}' does not exist.`, inputPath));
  }
  if (!stats.isFile()) {
    return err(new InputError(`Input path '${displayName}' is not a file.`, inputPath));
  }
  return ok(undefined);
}

/**
 * Decide the header cutoff: an explicit count wins, otherwise detect and confirm
 */
async function resolveHeaderLines(
  inputPath: string,
  settings: Settings,
  streams: CommandStreams
): Promise<number> {
  if (settings.headerLines > 0 || settings.detectHeader === "skip") {
    return settings.headerLines;
  }

  // Created after configure() so it inherits the run's level
  const log = logger.child("[header]");

  const detection = await detectHeaderInFile(inputPath, settings.header);
  if (!detection.success) {
    log.warn(`Detection failed: ${detection.error.message}`);
    return 0;
  }

  const decision = detection.data;
  if (decision.lineCount === 0) {
    log.debug("No header detected");
    return 0;
  }

  streams.stderr.write(`${formatHeaderNotice(decision)}\n`);

  const accepted =
    settings.detectHeader === "accept" ||
    (await askYesNo(HEADER_QUESTION, { input: streams.stdin, output: streams.stderr }));

  if (accepted) {
    writeLine(streams.stderr, `Header will be set to ${decision.lineCount} lines.`);
    return decision.lineCount;
  }
  writeLine(streams.stderr, "Header detection ignored. Processing the entire file.");
  return 0;
}

/**
 * Open the output file up front so a bad path fails before any work is done
 */
async function openOutput(outputPath: string): Promise<Result<Writable, OutputError>> {
  const handle = await tryCatchAsync(() => open(outputPath, "w"));
  if (!handle.success) {
    return err(
      new OutputError(`Failed to create output file '${outputPath}': ${handle.error.message}`, outputPath)
    );
  }
  return ok(handle.data.createWriteStream({ encoding: "utf-8" }));
}

function warnAboutUnterminated(report: ScrubReport): void {
  if (report.unterminatedBlockStart !== null) {
    logger.warn(`Unterminated block comment starting at line ${report.unterminatedBlockStart}`);
  } else if (report.finalMode !== "normal" && report.finalMode !== "lineComment") {
    logger.debug(`Input ended inside ${describeMode(report.finalMode)}`);
  }
}

/**
 * Run a scrub and return the process exit code
 */
export async function runScrub(
  input: string,
  options: ScrubCommandOptions,
  streams: CommandStreams = defaultStreams()
): Promise<number> {
  const fail = (error: Error): number => {
    writeLine(streams.stderr, formatError(error));
    return 1;
  };

  const configResult = loadConfig({ path: options.config });
  if (!configResult.success) {
    return fail(configResult.error);
  }

  const settingsResult = resolveSettings(options, configResult.data.config);
  if (!settingsResult.success) {
    return fail(settingsResult.error);
  }
  const settings = settingsResult.data;
  logger.configure({ level: settings.logLevel });
  if (configResult.data.path !== null) {
    logger.debug(`Using config file: ${configResult.data.path}`);
  }

  const inputPath = resolve(input);
  const inputCheck = checkInputFile(inputPath, input);
  if (!inputCheck.success) {
    return fail(inputCheck.error);
  }

  const headerLines = await resolveHeaderLines(inputPath, settings, streams);
  const isDryRun = options.dryRun === true;
  const outputPath = options.output !== undefined ? resolve(options.output) : null;

  let sink: Writable | null = null;
  if (!isDryRun) {
    if (outputPath !== null) {
      const opened = await openOutput(outputPath);
      if (!opened.success) {
        return fail(opened.error);
      }
      sink = opened.data;
    } else {
      sink = streams.stdout;
    }
  }

  const level = logger.getLevel();
  const showSpinner =
    outputPath !== null &&
    !isDryRun &&
    !settings.verbose &&
    level !== "error" &&
    level !== "silent" &&
    process.stderr.isTTY === true;
  const spinner = showSpinner ? ora(`Scrubbing ${input}...`).start() : null;

  const scrubResult = await tryCatchAsync(() =>
    scrubStream(createReadStream(inputPath, { encoding: "utf-8" }), sink, {
      headerLines,
      endSink: outputPath !== null,
    })
  );

  if (!scrubResult.success) {
    spinner?.fail("Scrub failed");
    return fail(
      new ScrubError(`Failed to process '${input}': ${scrubResult.error.message}`, "SCRUB_FAILED", {
        inputPath,
        outputPath,
      })
    );
  }
  spinner?.stop();

  const report = scrubResult.data;
  logger.debug(`Copied ${report.headerLines} header lines, scanned ${report.bodyLines} lines`);
  warnAboutUnterminated(report);

  if (settings.verbose) {
    writeLine(streams.stderr, formatVerboseReport(report));
  }

  if (isDryRun) {
    if (settings.verbose) {
      writeLine(streams.stderr, "Dry run complete. No output file written.");
    } else {
      writeLine(streams.stdout, formatDryRunSummary(report.stats));
    }
  } else if (outputPath !== null) {
    writeLine(settings.verbose ? streams.stderr : streams.stdout, `Output written to ${options.output ?? outputPath}`);
  }

  return 0;
}

export function registerScrubCommand(program: Command): void {
  program
    .command("scrub <input>", { isDefault: true })
    .description("Remove comments from a source file")
    .option("-H, --header-lines <n>", "Leading lines to copy verbatim (0 = detect)")
    .option("-o, --output <path>", "Write to a file instead of stdout")
    .option("-v, --verbose", "List every removed comment and totals")
    .option("-d, --dry-run", "Report what would be removed without writing output")
    .option("-y, --yes", "Accept a detected header without asking")
    .option("--no-detect", "Skip header detection")
    .option("-c, --config <path>", "Config file (default: .linescrubrc.yaml in the working directory)")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (input: string, options: ScrubCommandOptions) => {
      process.exitCode = await runScrub(input, options);
    });
}
