/**
 * Base error class for all linescrub errors
 */
export class ScrubError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ScrubError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for invalid command-line option values
 */
export class ValidationError extends ScrubError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for a missing, unreadable or non-regular input file
 */
export class InputError extends ScrubError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "INPUT_ERROR", { ...context, filePath });
    this.name = "InputError";
  }
}

/**
 * Error for output that cannot be created or written
 */
export class OutputError extends ScrubError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "OUTPUT_ERROR", { ...context, filePath });
    this.name = "OutputError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends ScrubError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}
