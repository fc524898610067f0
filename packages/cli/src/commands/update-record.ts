import type { Command } from 'commander';
import { ConfigLoader, createNameRecordClient, resolveCiContext } from '@repo-blob/core';
import { ConfigError, UsageError } from '@repo-blob/shared';
import { splitRepository } from '@repo-blob/storage';
import { createLogger, createRenderer, globalOptions } from './context';

export function registerUpdateRecordCommand(program: Command) {
  program
    .command('update-record')
    .description('Point the repository name record at a blob id')
    .requiredOption('--cid <id>', 'Blob id to publish')
    .option('--repository <slug>', 'Repository as owner/name (defaults to GITHUB_REPOSITORY)')
    .action(async (options: { cid: string; repository?: string }) => {
      const globalOpts = globalOptions(program);
      const config = ConfigLoader.load({ configPath: globalOpts.config });
      const logger = createLogger(globalOpts);

      const client = createNameRecordClient(config, process.env, logger);
      if (!client) {
        throw new ConfigError(
          'No name-record server configured. Set nameRecord.serverUrl or NAME_RECORD_SERVER_URL.',
        );
      }

      const slug = options.repository ?? resolveCiContext().repository;
      if (slug === 'unknown') {
        throw new UsageError('Repository is unknown. Pass --repository or set GITHUB_REPOSITORY.');
      }

      const { label, repository } = splitRepository(slug);
      const result = await client.update({ label, repository, cid: options.cid });

      createRenderer(globalOpts).render({
        kind: 'record',
        label,
        repository,
        cid: options.cid,
        transactionHash: result.transactionHash,
        explorerLink: result.explorerLink,
      });
    });
}
