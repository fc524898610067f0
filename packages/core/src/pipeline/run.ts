import { randomUUID } from 'crypto';
import path from 'path';
import {
  SilentLogger,
  removeIfExists,
  type Logger,
  type RepoBlobConfig,
} from '@repo-blob/shared';
import type { CodebasePackager, DocumentSummary, SkippedFile } from '@repo-blob/packager';
import {
  splitRepository,
  type NameRecordClient,
  type NameRecordUpdateResult,
  type StoredBlob,
  type WalrusClient,
} from '@repo-blob/storage';
import type { CiContext } from '../ci/context';
import { createNameRecordClient, createWalrusClient } from './clients';
import { exportBlobId, packRepository, resolveOutputPath, uploadDocumentFile } from './steps';

export interface PipelineOptions {
  root: string;
  config: RepoBlobConfig;
  context: CiContext;
  env?: NodeJS.ProcessEnv;
  /** Leave the output document on disk after the run */
  keepArtifact?: boolean;
  logger?: Logger;
  now?: () => Date;
  runId?: string;
  packager?: CodebasePackager;
  walrus?: WalrusClient;
  nameRecord?: NameRecordClient;
}

export interface PipelineResult {
  runId: string;
  outputPath: string;
  bytes: number;
  summary: DocumentSummary;
  skipped: SkippedFile[];
  blob: StoredBlob;
  /** Absent when no record server is configured */
  record?: NameRecordUpdateResult;
  context: CiContext;
  durationMs: number;
}

/**
 * Packs the repository, stores the document on Walrus and forwards the
 * blob id to the name-record server. Any failure ends the run; the output
 * document is removed either way unless `keepArtifact` is set.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, context } = options;
  const env = options.env ?? process.env;
  const logger = options.logger ?? new SilentLogger();
  const now = options.now ?? (() => new Date());
  const runId = options.runId ?? randomUUID();
  const root = path.resolve(options.root);
  const startedAt = now().getTime();
  const { outputPath } = resolveOutputPath(root, config.packager.output);

  const base = () => ({ schemaVersion: 1, timestamp: now().toISOString(), runId });

  try {
    const walrus = options.walrus ?? createWalrusClient(config, env, logger);
    const nameRecord = options.nameRecord ?? createNameRecordClient(config, env, logger);

    await logger.log({
      ...base(),
      type: 'RunStarted',
      payload: {
        root,
        repository: context.repository,
        branch: context.branch,
        commit: context.commit,
      },
    });

    const packed = await packRepository({
      root,
      config: config.packager,
      context,
      logger: logger.child({ step: 'pack' }),
      packager: options.packager,
      now,
    });

    for (const skipped of packed.skipped) {
      await logger.log({ ...base(), type: 'FileSkipped', payload: skipped });
    }
    for (const warning of packed.warnings) {
      await logger.warn(warning);
    }
    await logger.trace(
      {
        ...base(),
        type: 'PackCompleted',
        payload: {
          outputPath: packed.outputPath,
          totalFiles: packed.summary.totalFiles,
          totalSize: packed.summary.totalSize,
          errorFiles: packed.summary.error,
        },
      },
      `✅ Created ${config.packager.output} with ${packed.summary.totalFiles} files`,
    );
    await logger.info(`📦 Total size: ${packed.summary.totalSize} bytes`);

    const blob = await uploadDocumentFile(walrus, packed.outputPath);
    await logger.trace(
      {
        ...base(),
        type: 'BlobStored',
        payload: { blobId: blob.blobId, source: blob.source, url: blob.url },
      },
      `✅ Extracted Blob ID: ${blob.blobId}`,
    );
    await logger.info(`📄 Access your codebase at: ${blob.url}`);

    if (context.envFile) {
      await exportBlobId(context.envFile, blob.blobId);
    }

    let record: NameRecordUpdateResult | undefined;
    if (nameRecord) {
      const { label, repository } = splitRepository(context.repository);
      record = await nameRecord.update({ label, repository, cid: blob.blobId });
      await logger.trace(
        {
          ...base(),
          type: 'RecordUpdated',
          payload: { label, repository, cid: blob.blobId, transactionHash: record.transactionHash },
        },
        '✅ Successfully updated ENS text record!',
      );
      if (record.explorerLink) {
        await logger.info(`🔗 Transaction: ${record.explorerLink}`);
      }
    } else {
      await logger.warn('No name-record server configured; skipping the record update');
    }

    const durationMs = now().getTime() - startedAt;
    await logger.log({
      ...base(),
      type: 'RunFinished',
      payload: { status: 'success', durationMs, blobId: blob.blobId },
    });

    return {
      runId,
      outputPath: packed.outputPath,
      bytes: packed.bytes,
      summary: packed.summary,
      skipped: packed.skipped,
      blob,
      record,
      context,
      durationMs,
    };
  } catch (error) {
    await logger.log({
      ...base(),
      type: 'RunFinished',
      payload: {
        status: 'failure',
        durationMs: now().getTime() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      },
    });
    throw error;
  } finally {
    if (!options.keepArtifact) {
      try {
        await removeIfExists(outputPath);
      } catch (cleanupError) {
        // The run's own outcome wins over a failed cleanup.
        await logger.warn(
          `Failed to remove ${outputPath}: ${
            cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          }`,
        );
      }
    }
  }
}
