/**
 * Config command - Inspect the effective configuration
 */

import chalk from "chalk";

import type { Command } from "commander";

import { loadConfig, resolveSettings } from "../config.js";
import { formatError } from "../formatters.js";
import { defaultStreams, writeLine } from "../shared.js";

import type { CommandStreams } from "../shared.js";

export interface ConfigShowOptions {
  config?: string;
}

export function runConfigShow(options: ConfigShowOptions, streams: CommandStreams = defaultStreams()): number {
  const configResult = loadConfig({ path: options.config });
  if (!configResult.success) {
    writeLine(streams.stderr, formatError(configResult.error));
    return 1;
  }

  const settingsResult = resolveSettings({}, configResult.data.config);
  if (!settingsResult.success) {
    writeLine(streams.stderr, formatError(settingsResult.error));
    return 1;
  }

  const source = configResult.data.path ?? "(defaults)";
  writeLine(streams.stdout, chalk.gray(`Config file: ${source}`));
  writeLine(streams.stdout, JSON.stringify(settingsResult.data, null, 2));
  return 0;
}

export function registerConfigCommand(program: Command): void {
  const config = program.command("config").description("Inspect configuration");

  config
    .command("show")
    .description("Print the settings a scrub would run with")
    .option("-c, --config <path>", "Config file (default: .linescrubrc.yaml in the working directory)")
    .addHelpText(
      "after",
      `
Config files are looked up in the working directory, in this order:
  .linescrubrc.yaml, .linescrubrc.yml, .linescrubrc.json

Environment:
  LINESCRUB_LOG_LEVEL   debug, info, warn, error or silent
`
    )
    .action((options: ConfigShowOptions) => {
      process.exitCode = runConfigShow(options);
    });
}
