import path from 'path';
import type { Command } from 'commander';
import { ConsoleLogger, JsonlLogger, type Logger } from '@repo-blob/shared';
import { OutputRenderer } from '../output/renderer';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/**
 * Console output for humans; with `--log-file` structured events also go
 * to a JSONL file. In JSON mode progress messages move to stderr.
 */
export function createLogger(options: GlobalOptions): Logger {
  const consoleLogger = new ConsoleLogger({
    verbose: options.verbose,
    stderr: options.json,
  });
  return options.logFile
    ? new JsonlLogger(path.resolve(options.logFile), consoleLogger)
    : consoleLogger;
}

export function createRenderer(options: GlobalOptions): OutputRenderer {
  return new OutputRenderer(Boolean(options.json));
}
