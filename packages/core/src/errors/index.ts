/**
 * Custom Error Classes
 */

/**
 * Base error class for all file-sorter errors
 */
export class FileSorterError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FileSorterError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid user input (extension, path, option value)
 */
export class ValidationError extends FileSorterError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Tracked directories that are missing or not directories
 */
export class ConfigurationError extends FileSorterError {
  public readonly invalidPaths: readonly string[];

  constructor(invalidPaths: readonly string[], message?: string) {
    super(
      message ?? `Not a directory: ${invalidPaths.join(', ')}`,
      'CONFIGURATION_ERROR',
      { invalidPaths: [...invalidPaths] }
    );
    this.name = 'ConfigurationError';
    this.invalidPaths = invalidPaths;
  }
}

/**
 * Reading or writing the extension configuration file failed
 */
export class ConfigFileError extends FileSorterError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(
      `${reason}: ${path}`,
      'CONFIG_FILE_ERROR',
      { path, reason },
      { cause }
    );
    this.name = 'ConfigFileError';
  }
}

export type MoveErrorKind =
  | 'source-vanished'
  | 'permission-denied'
  | 'destination-unwritable'
  | 'unexpected-io';

const MOVE_ERROR_CODES: Record<MoveErrorKind, string> = {
  'source-vanished': 'SOURCE_VANISHED',
  'permission-denied': 'PERMISSION_DENIED',
  'destination-unwritable': 'DESTINATION_UNWRITABLE',
  'unexpected-io': 'UNEXPECTED_IO_ERROR',
};

/**
 * A single file could not be moved
 */
export class MoveError extends FileSorterError {
  public readonly kind: MoveErrorKind;
  public readonly sourcePath: string;
  public readonly destinationDir?: string;

  constructor(
    kind: MoveErrorKind,
    sourcePath: string,
    destinationDir: string | undefined,
    message: string,
    cause?: unknown
  ) {
    super(
      message,
      MOVE_ERROR_CODES[kind],
      { kind, sourcePath, destinationDir },
      { cause }
    );
    this.name = 'MoveError';
    this.kind = kind;
    this.sourcePath = sourcePath;
    this.destinationDir = destinationDir;
  }
}

/**
 * A watcher could not attach to a tracked directory
 */
export class WatchStartError extends FileSorterError {
  constructor(directory: string, cause: unknown) {
    super(
      `Failed to watch ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'WATCH_START_ERROR',
      { directory },
      { cause }
    );
    this.name = 'WatchStartError';
  }
}

export function isFileSorterError(error: unknown): error is FileSorterError {
  return error instanceof FileSorterError;
}
