import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Minimal writable target, process.stderr by default
 */
export interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Type guard for log level strings coming from env or config
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Leveled logger with colored output.
 *
 * Everything goes to stderr: stdout carries the scrubbed source.
 */
class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private sink: LogSink | null = null;

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  /**
   * Redirect output, or pass null to go back to stderr
   */
  setSink(sink: LogSink | null): void {
    this.sink = sink;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.level];
  }

  private emit(text: string): void {
    const line = this.prefix ? `${this.prefix} ${text}` : text;
    (this.sink ?? process.stderr).write(`${line}\n`);
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string): void {
    if (this.shouldLog("debug")) {
      this.emit(chalk.gray(message));
    }
  }

  /**
   * Info level logging (default color)
   */
  info(message: string): void {
    if (this.shouldLog("info")) {
      this.emit(message);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string): void {
    if (this.shouldLog("warn")) {
      this.emit(chalk.yellow(message));
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string): void {
    if (this.shouldLog("error")) {
      this.emit(chalk.red(message));
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.sink = this.sink;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

export type { Logger };
