/**
 * Custom Error classes for the benchmark recorder
 */

export interface ErrorOptions {
  code: string;
  cause?: Error;
}

/**
 * Base error class for all recorder errors
 */
export class RecorderError extends Error {
  public readonly code: string;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * A required result file is missing, unreadable, or carries no usable timing value.
 * Always fatal for the mode being recorded.
 */
export class ExtractionError extends RecorderError {
  public readonly fileName: string;

  constructor(
    fileName: string,
    options: Partial<ErrorOptions> & { message?: string } = {}
  ) {
    super(options.message ?? `Could not extract execution time for ${fileName}`, {
      code: options.code ?? 'EXTRACTION_ERROR',
      cause: options.cause,
    });
    this.fileName = fileName;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), fileName: this.fileName };
  }
}

/**
 * Configuration/initialization error
 */
export class ConfigurationError extends RecorderError {
  constructor(
    message: string,
    options: Omit<ErrorOptions, 'code'> & Partial<Pick<ErrorOptions, 'code'>> = {}
  ) {
    super(message, {
      code: options.code ?? 'CONFIGURATION_ERROR',
      cause: options.cause,
    });
  }
}

/**
 * Convert an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
