import * as fs from 'fs/promises';
import type { PipelineEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL file and forwards plain
 * messages to a delegate logger (the console by default).
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly delegate: Logger;

  constructor(filePath: string, delegate: Logger) {
    this.filePath = filePath;
    this.delegate = delegate;
  }

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    await this.delegate.info(message);
    await this.log(event);
  }

  debug(message: string) {
    return this.delegate.debug(message);
  }

  info(message: string) {
    return this.delegate.info(message);
  }

  warn(message: string) {
    return this.delegate.warn(message);
  }

  error(error: Error, message?: string) {
    return this.delegate.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.delegate.child(bindings));
  }
}
