#!/usr/bin/env node
/**
 * linescrub CLI entry point
 */

import { logger } from "../lib/index.js";

import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
