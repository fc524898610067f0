import { promises as fs } from 'fs';
import path from 'path';
import type { Command } from 'commander';
import {
  ConfigLoader,
  createWalrusClient,
  exportBlobId,
  resolveCiContext,
  uploadDocumentFile,
} from '@repo-blob/core';
import { UsageError } from '@repo-blob/shared';
import { createLogger, createRenderer, globalOptions } from './context';

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function registerUploadCommand(program: Command) {
  program
    .command('upload')
    .description('Upload an existing document to Walrus and print its blob id')
    .argument('<file>', 'Document to upload')
    .action(async (file: string) => {
      const globalOpts = globalOptions(program);
      const filePath = path.resolve(file);
      if (!(await isFile(filePath))) {
        throw new UsageError(`File not found: ${file}`);
      }

      const config = ConfigLoader.load({ configPath: globalOpts.config });
      const logger = createLogger(globalOpts);
      const client = createWalrusClient(config, process.env, logger);

      const blob = await uploadDocumentFile(client, filePath);
      const { envFile } = resolveCiContext();
      if (envFile) {
        await exportBlobId(envFile, blob.blobId);
      }

      createRenderer(globalOpts).render({
        kind: 'upload',
        blobId: blob.blobId,
        source: blob.source,
        url: blob.url,
      });
    });
}
