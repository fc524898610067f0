import { Command } from 'commander';
import { version } from '../package.json';
import { AppError } from '@repo-blob/shared';
import { registerPackCommand } from './commands/pack';
import { registerUploadCommand } from './commands/upload';
import { registerUpdateRecordCommand } from './commands/update-record';
import { registerRunCommand } from './commands/run';
import type { GlobalOptions } from './commands/context';

export const name = '@repo-blob/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('repo-blob')
    .description('Pack a repository into one JSON document and store it on Walrus')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to a JSONL file')
    // Parse errors surface as CommanderError so main() picks the exit code
    .exitOverride();

  registerPackCommand(program);
  registerUploadCommand(program);
  registerUpdateRecordCommand(program);
  registerRunCommand(program);

  return program;
}

export function renderError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}
