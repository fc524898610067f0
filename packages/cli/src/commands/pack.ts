import path from 'path';
import type { Command } from 'commander';
import { ConfigLoader, packRepository, resolveCiContext } from '@repo-blob/core';
import { createLogger, createRenderer, globalOptions } from './context';

export function registerPackCommand(program: Command) {
  program
    .command('pack')
    .description('Package a repository into one JSON document without uploading it')
    .option('--root <dir>', 'Repository root to package', '.')
    .option('--output <file>', 'Where to write the document (relative to the root)')
    .action(async (options: { root: string; output?: string }) => {
      const globalOpts = globalOptions(program);
      const root = path.resolve(options.root);
      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        cwd: root,
        flags: options.output ? { packager: { output: options.output } } : undefined,
      });
      const logger = createLogger(globalOpts);

      const packed = await packRepository({
        root,
        config: config.packager,
        context: resolveCiContext(),
        logger: logger.child({ step: 'pack' }),
      });
      for (const warning of packed.warnings) {
        await logger.warn(warning);
      }

      createRenderer(globalOpts).render({
        kind: 'pack',
        outputPath: packed.outputPath,
        bytes: packed.bytes,
        summary: packed.summary,
        skipped: packed.skipped,
      });
    });
}
