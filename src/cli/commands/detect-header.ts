/**
 * Detect-header command - Show the header that scrub would offer to keep
 */

import { resolve } from "path";

import type { Command } from "commander";

import { detectHeaderInFile } from "../../core/index.js";
import { logger } from "../../lib/index.js";
import { loadConfig, resolveSettings } from "../config.js";
import { formatError, formatHeaderDecision } from "../formatters.js";
import { defaultStreams, writeLine } from "../shared.js";
import { checkInputFile } from "./scrub.js";

import type { CommandStreams } from "../shared.js";

export interface DetectHeaderCommandOptions {
  json?: boolean;
  config?: string;
}

export async function runDetectHeader(
  input: string,
  options: DetectHeaderCommandOptions,
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
  const settingsResult = resolveSettings({}, configResult.data.config);
  if (!settingsResult.success) {
    return fail(settingsResult.error);
  }
  logger.configure({ level: settingsResult.data.logLevel });

  const inputPath = resolve(input);
  const inputCheck = checkInputFile(inputPath, input);
  if (!inputCheck.success) {
    return fail(inputCheck.error);
  }

  const detection = await detectHeaderInFile(inputPath, settingsResult.data.header);
  if (!detection.success) {
    return fail(detection.error);
  }

  writeLine(streams.stdout, formatHeaderDecision(detection.data, options.json === true));
  return 0;
}

export function registerDetectHeaderCommand(program: Command): void {
  program
    .command("detect-header <input>")
    .description("Show the header detected at the top of a file without scrubbing it")
    .option("--json", "Print the decision as JSON")
    .option("-c, --config <path>", "Config file (default: .linescrubrc.yaml in the working directory)")
    .action(async (input: string, options: DetectHeaderCommandOptions) => {
      process.exitCode = await runDetectHeader(input, options);
    });
}
