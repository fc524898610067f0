#!/usr/bin/env node
import { CommanderError } from 'commander';
import { exitCodeFor } from '@repo-blob/shared';
import { createProgram, renderError } from './program';
import type { GlobalOptions } from './commands/context';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage problem.
      process.exit(e.exitCode === 0 ? 0 : 2);
    }
    renderError(e, program.opts<GlobalOptions>());
    process.exit(exitCodeFor(e));
  }
}

void main();
