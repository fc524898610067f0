import path from 'path';
import type { Command } from 'commander';
import { ConfigLoader, resolveCiContext, runPipeline } from '@repo-blob/core';
import { createLogger, createRenderer, globalOptions } from './context';

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Package the repository, upload it and update the name record')
    .option('--root <dir>', 'Repository root to package', '.')
    .option('--keep-artifact', 'Leave the output document on disk after the run')
    .action(async (options: { root: string; keepArtifact?: boolean }) => {
      const globalOpts = globalOptions(program);
      const root = path.resolve(options.root);
      const config = ConfigLoader.load({ configPath: globalOpts.config, cwd: root });
      const logger = createLogger(globalOpts);

      const result = await runPipeline({
        root,
        config,
        context: resolveCiContext(),
        keepArtifact: options.keepArtifact,
        logger,
      });

      createRenderer(globalOpts).render({
        kind: 'run',
        status: 'SUCCESS',
        runId: result.runId,
        blobId: result.blob.blobId,
        url: result.blob.url,
        summary: result.summary,
        recordUpdated: result.record !== undefined,
        explorerLink: result.record?.explorerLink,
        artifactPath: options.keepArtifact ? result.outputPath : undefined,
        durationMs: result.durationMs,
      });
    });
}
