/**
 * Configuration Management
 *
 * Reads an optional project config file (YAML or JSON) and merges it with
 * command-line flags and the environment.
 * Precedence: flag > environment > config file > defaults.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { DEFAULT_MAX_HEADER_LINES, DEFAULT_PREVIEW_LINES } from "../core/index.js";
import { ConfigError, ValidationError } from "../lib/errors.js";
import { isLogLevel, LOG_LEVELS } from "../lib/logger.js";
import { err, ok, tryCatch } from "../lib/result.js";

import type { LogLevel } from "../lib/logger.js";
import type { Result } from "../lib/result.js";

export const CONFIG_FILENAMES = [".linescrubrc.yaml", ".linescrubrc.yml", ".linescrubrc.json"] as const;

export const LOG_LEVEL_ENV = "LINESCRUB_LOG_LEVEL";

export const HEADER_DETECTION_MODES = ["prompt", "accept", "skip"] as const;

export type HeaderDetectionMode = (typeof HEADER_DETECTION_MODES)[number];

/**
 * Configuration schema
 */
export const ConfigSchema = z
  .object({
    headerLines: z.number().int().nonnegative().optional(),
    detectHeader: z.enum(HEADER_DETECTION_MODES).optional(),
    verbose: z.boolean().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    header: z
      .object({
        maxLines: z.number().int().positive().optional(),
        previewLines: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export interface LoadedConfig {
  config: Config;
  /** File the config came from, null when defaults are in use */
  path: string | null;
}

export interface LoadConfigOptions {
  /** Explicit config path; must exist */
  path?: string | undefined;
  /** Directory searched for a default config file */
  cwd?: string;
}

/**
 * Find the first default config file in a directory
 */
export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load and validate configuration from disk
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<LoadedConfig, ConfigError> {
  const cwd = options.cwd ?? process.cwd();
  let configPath: string | null;

  if (options.path !== undefined) {
    configPath = resolve(cwd, options.path);
    if (!existsSync(configPath)) {
      return err(new ConfigError(`Config file not found: ${configPath}`, { path: configPath }));
    }
  } else {
    configPath = findConfigFile(cwd);
    if (configPath === null) {
      return ok({ config: {}, path: null });
    }
  }

  const filePath = configPath;
  const parsed = tryCatch((): unknown => YAML.parse(readFileSync(filePath, "utf-8")));
  if (!parsed.success) {
    return err(
      new ConfigError(`Failed to read config file ${filePath}: ${parsed.error.message}`, {
        path: filePath,
      })
    );
  }

  // An empty file parses to null
  const validation = ConfigSchema.safeParse(parsed.data ?? {});
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    return err(
      new ConfigError(`Invalid config file ${filePath}: ${issues.join("; ")}`, {
        path: filePath,
        issues,
      })
    );
  }

  return ok({ config: validation.data, path: filePath });
}

/**
 * Flags as commander hands them over
 */
export interface CliFlags {
  headerLines?: string | undefined;
  verbose?: boolean | undefined;
  quiet?: boolean | undefined;
  yes?: boolean | undefined;
  /** false when --no-detect is given */
  detect?: boolean | undefined;
}

/**
 * Effective settings for one run
 */
export interface Settings {
  headerLines: number;
  detectHeader: HeaderDetectionMode;
  verbose: boolean;
  logLevel: LogLevel;
  header: {
    maxLines: number;
    previewLines: number;
  };
}

/**
 * Parse a non-negative integer flag value
 */
export function parseLineCount(value: string, flag: string): Result<number, ValidationError> {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return err(new ValidationError(`Invalid ${flag}: ${value}. Expected a non-negative integer`, { flag, value }));
  }
  return ok(Number.parseInt(trimmed, 10));
}

/**
 * Merge flags, environment and config file into settings
 */
export function resolveSettings(
  flags: CliFlags,
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): Result<Settings, ValidationError> {
  let headerLines = config.headerLines ?? 0;
  if (flags.headerLines !== undefined) {
    const parsed = parseLineCount(flags.headerLines, "--header-lines");
    if (!parsed.success) {
      return parsed;
    }
    headerLines = parsed.data;
  }

  let detectHeader: HeaderDetectionMode = config.detectHeader ?? "prompt";
  if (flags.detect === false) {
    detectHeader = "skip";
  } else if (flags.yes === true) {
    detectHeader = "accept";
  }

  const verbose = flags.verbose ?? config.verbose ?? false;

  let logLevel: LogLevel = config.logLevel ?? "info";
  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel !== undefined && envLevel.length > 0) {
    if (!isLogLevel(envLevel)) {
      return err(
        new ValidationError(`Invalid ${LOG_LEVEL_ENV}: ${envLevel}. Use: ${LOG_LEVELS.join(", ")}`, {
          value: envLevel,
        })
      );
    }
    logLevel = envLevel;
  }
  if (flags.quiet === true) {
    logLevel = "error";
  } else if (verbose) {
    logLevel = "debug";
  }

  return ok({
    headerLines,
    detectHeader,
    verbose,
    logLevel,
    header: {
      maxLines: config.header?.maxLines ?? DEFAULT_MAX_HEADER_LINES,
      previewLines: config.header?.previewLines ?? DEFAULT_PREVIEW_LINES,
    },
  });
}
