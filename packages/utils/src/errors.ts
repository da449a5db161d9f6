/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for model loading and writing.
 *
 * Fatal load errors all extend ModelLoadError. A PackageLoadError is recorded
 * per package and never aborts a load on its own.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: Record<string, unknown>,
    isOperational: boolean = true,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for invalid options or model state changes
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * Model load error - a load that cannot produce a usable model
 */
export class ModelLoadError extends AppError {
  constructor(
    message: string,
    code: string = 'MODEL_LOAD_ERROR',
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, context, true, cause);
  }
}

/**
 * Manifest format error - the name file could not be read or parsed
 */
export class ManifestFormatError extends ModelLoadError {
  public readonly lineNumber?: number;
  public readonly line?: string;

  constructor(
    message: string,
    lineNumber?: number,
    line?: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    const where = lineNumber === undefined ? '' : ` (line ${lineNumber}: '${line ?? ''}')`;
    super(`${message}${where}`, 'MANIFEST_FORMAT_ERROR', { lineNumber, line, ...context }, cause);
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * Missing discretization error - no DIS entry in the name file
 */
export class MissingDiscretizationError extends ModelLoadError {
  constructor(namefile: string) {
    super(
      `Name file '${namefile}' does not contain a discretization (DIS) entry`,
      'MISSING_DISCRETIZATION',
      { namefile }
    );
  }
}

/**
 * Invalid load-only error - requested filetypes are absent from the name file
 */
export class InvalidLoadOnlyError extends ModelLoadError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(
      `the following load_only entries were not found in the name file: ${missing.join(',')}`,
      'INVALID_LOAD_ONLY',
      { missing }
    );
    this.missing = missing;
  }
}

/**
 * Package load error - a single package's loader failed
 */
export class PackageLoadError extends AppError {
  public readonly filetype: string;
  public readonly filename: string;

  constructor(message: string, filetype: string, filename: string, cause?: unknown) {
    super(message, 'PACKAGE_LOAD_ERROR', { filetype, filename }, true, cause);
    this.filetype = filetype;
    this.filename = filename;
  }
}

/**
 * Model I/O error - a file system failure while writing model files
 */
export class ModelIOError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'MODEL_IO_ERROR', { path }, true, cause);
    this.path = path;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Check if error aborts a model load
 */
export function isFatalLoadError(error: unknown): error is ModelLoadError {
  return error instanceof ModelLoadError;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
