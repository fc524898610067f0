/**
 * Error codes used throughout repo-blob.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PackagingError'
  | 'HttpError'
  | 'UploadError'
  | 'RecordUpdateError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all repo-blob errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('UploadError', 'Publisher rejected the blob', {
 *   cause: originalError,
 *   details: { status: 413 }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the traversal root cannot be read or the
 * output document cannot be written. Per-file read failures never
 * raise this; they become `error` records instead.
 */
export class PackagingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PackagingError', message, options);
  }
}

/**
 * Error thrown for HTTP-related failures.
 * Includes the response status when one was received.
 */
export class HttpError extends AppError {
  /** HTTP status of the failed response, absent for network failures */
  public readonly status?: number;

  constructor(
    message: string,
    options: AppErrorOptions & { status?: number; code?: ErrorCode } = {},
  ) {
    super(options.code ?? 'HttpError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when the blob store rejects an upload or its response
 * carries no recognisable blob id.
 */
export class UploadError extends HttpError {
  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super(message, { ...options, code: 'UploadError' });
  }
}

/**
 * Error thrown when the name-record server does not accept an update.
 */
export class RecordUpdateError extends HttpError {
  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super(message, { ...options, code: 'RecordUpdateError' });
  }
}

/**
 * Maps an error to the process exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
