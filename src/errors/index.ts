// Base error class for all pystylelint errors
export class PyStyleLintError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'PyStyleLintError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends PyStyleLintError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends PyStyleLintError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for analysis protocol misuse
export class ProcessingError extends PyStyleLintError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Source text is not valid Python; the whole file is rejected
export class ParseError extends PyStyleLintError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

// File could not be read (missing, permission denied, not a file)
export class FileReadError extends PyStyleLintError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly systemCode?: string
  ) {
    super(message, 'IO_ERROR');
    this.name = 'FileReadError';
  }
}

/**
 * Type guard for the two per-file failure kinds that batch mode reports and skips.
 */
export function isFileFailure(error: unknown): error is ParseError | FileReadError {
  return error instanceof ParseError || error instanceof FileReadError;
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
