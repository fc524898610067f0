import { promises as fs } from 'fs';
import path from 'path';
import {
  UploadError,
  relativePosix,
  type Logger,
  type PackagerConfig,
} from '@repo-blob/shared';
import {
  CodebasePackager,
  summarizeDocument,
  writeDocument,
  type DocumentSummary,
  type OutputDocument,
  type SkippedFile,
} from '@repo-blob/packager';
import type { StoredBlob, WalrusClient } from '@repo-blob/storage';
import type { CiContext } from '../ci/context';

export interface PackRepositoryOptions {
  root: string;
  config: PackagerConfig;
  context: CiContext;
  logger?: Logger;
  packager?: CodebasePackager;
  now?: () => Date;
}

export interface PackedRepository {
  outputPath: string;
  /** Serialized size of the document */
  bytes: number;
  document: OutputDocument;
  summary: DocumentSummary;
  skipped: SkippedFile[];
  warnings: string[];
}

/**
 * Resolves the output path against the root. When it lies inside the root
 * the relative path is returned so the packager can leave it out.
 */
export function resolveOutputPath(root: string, output: string): { outputPath: string; inside?: string } {
  const outputPath = path.resolve(root, output);
  const relative = relativePosix(root, outputPath);
  const inside = relative.startsWith('../') || relative === '..' || path.isAbsolute(relative)
    ? undefined
    : relative;
  return { outputPath, inside };
}

export async function packRepository(options: PackRepositoryOptions): Promise<PackedRepository> {
  const root = path.resolve(options.root);
  const { config, context } = options;
  const { outputPath, inside } = resolveOutputPath(root, config.output);
  const packager = options.packager ?? new CodebasePackager();

  const { document, skipped, warnings } = await packager.package(root, {
    repository: context.repository,
    branch: context.branch,
    commit: context.commit,
    rules: {
      excludedDirs: config.excludedDirs,
      excludedExtensions: config.excludedExtensions,
      excludedFiles: config.excludedFiles,
    },
    maxFileSize: config.maxFileSize,
    ignorePaths: inside ? [inside] : [],
    now: options.now,
    logger: options.logger,
  });

  const bytes = await writeDocument(document, outputPath);

  return {
    outputPath,
    bytes,
    document,
    summary: summarizeDocument(document),
    skipped,
    warnings,
  };
}

/**
 * Uploads a document exactly as it sits on disk.
 */
export async function uploadDocumentFile(client: WalrusClient, filePath: string): Promise<StoredBlob> {
  const body = await fs.readFile(filePath);
  return client.storeBlob(body);
}

/**
 * Makes the blob id visible to later CI steps through the runner's env file.
 */
export async function exportBlobId(envFile: string, blobId: string): Promise<void> {
  // One KEY=value per line; a line break would start another variable.
  if (/[\r\n]/.test(blobId)) {
    throw new UploadError('Blob ID contains a line break and cannot be exported', {
      details: { blobId },
    });
  }
  await fs.appendFile(envFile, `WALRUS_BLOB_ID=${blobId}\n`, 'utf8');
}
