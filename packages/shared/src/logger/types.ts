import type { PipelineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout repo-blob.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'RunStarted', ... });
 *
 * // Log with trace context
 * logger.trace(event, 'Uploading codebase.json');
 *
 * // Standard logging
 * logger.info('Packaging completed');
 * logger.error(new Error('Failed'), 'Upload failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ step: 'upload' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured pipeline event.
   */
  log(event: PipelineEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * Combines structured event data with a human-readable summary.
   */
  trace(event: PipelineEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
