/**
 * Command tree for the linescrub CLI
 *
 * Commands:
 * - scrub         - Remove comments from a file (default command)
 * - detect-header - Show the header scrub would offer to keep
 * - config show   - Print the effective configuration
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerConfigCommand } from "./commands/config.js";
import { registerDetectHeaderCommand } from "./commands/detect-header.js";
import { registerScrubCommand } from "./commands/scrub.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("linescrub")
    .description("Remove comments from source files while leaving strings and raw strings intact")
    .version(VERSION);

  registerScrubCommand(program);
  registerDetectHeaderCommand(program);
  registerConfigCommand(program);

  return program;
}
