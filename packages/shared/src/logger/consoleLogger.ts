import type { PipelineEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and raw event JSON */
  verbose?: boolean;
  /** Send info and debug output to stderr, keeping stdout for JSON results */
  stderr?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly stderr: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stderr = options.stderr ?? false;
  }

  log(event: PipelineEvent): void {
    if (this.verbose) {
      this.writeDebug(JSON.stringify(event));
    }
  }

  trace(event: PipelineEvent, message: string): void {
    this.info(message);
    this.log(event);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.writeDebug(message);
    }
  }

  info(message: string): void {
    if (this.stderr) {
      console.error(message);
    } else {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private writeDebug(message: string): void {
    if (this.stderr) {
      console.error(message);
    } else {
      console.debug(message);
    }
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent) {
    return this.base.log(event);
  }

  trace(event: PipelineEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/**
 * Discards everything. Used where a caller does not pass a logger.
 */
export class SilentLogger implements Logger {
  log(_event: PipelineEvent): void {}
  trace(_event: PipelineEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
