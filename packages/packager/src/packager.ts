import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_MAX_FILE_SIZE,
  PackagingError,
  SilentLogger,
  normalizePath,
  type Logger,
} from '@repo-blob/shared';
import {
  captureContent,
  describeReadError,
  guessMimeType,
  type PackagerFs,
} from './content';
import { createExclusionRules, isExcludedCandidate } from './exclusion';
import type {
  ExclusionRules,
  FileRecord,
  OutputDocument,
  PackageOptions,
  PackageResult,
  SkippedFile,
} from './types';

const UNKNOWN = 'unknown';

function identifier(value: string | undefined): string {
  return value && value.length > 0 ? value : UNKNOWN;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

interface WalkState {
  readonly rules: ExclusionRules;
  readonly maxFileSize: number;
  readonly ignorePaths: ReadonlySet<string>;
  readonly logger: Logger;
  readonly files: Map<string, FileRecord>;
  readonly skipped: SkippedFile[];
  readonly warnings: string[];
  totalSize: number;
}

/**
 * Walks a directory tree and packs every qualifying file into one
 * {@link OutputDocument}. Work is strictly sequential: each file is
 * stat'ed, opened, read and closed before the next entry is looked at.
 */
export class CodebasePackager {
  private readonly fs: PackagerFs;

  constructor(fs: PackagerFs = nodeFs) {
    this.fs = fs;
  }

  async package(root: string, options: PackageOptions = {}): Promise<PackageResult> {
    const startedAt = (options.now ?? (() => new Date()))();
    const rootDir = path.resolve(root);

    const state: WalkState = {
      rules: createExclusionRules(options.rules),
      maxFileSize: options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
      ignorePaths: new Set((options.ignorePaths ?? []).map(normalizePath)),
      logger: options.logger ?? new SilentLogger(),
      files: new Map(),
      skipped: [],
      warnings: [],
      totalSize: 0,
    };

    let rootEntries: Dirent[];
    try {
      rootEntries = await this.fs.readdir(rootDir, { withFileTypes: true });
    } catch (error) {
      throw new PackagingError(`Cannot read traversal root ${rootDir}`, {
        cause: error,
        details: { root: rootDir },
      });
    }

    await this.walkEntries(rootDir, '', rootEntries, state);

    const document: OutputDocument = {
      metadata: {
        timestamp: startedAt.toISOString(),
        repository: identifier(options.repository),
        branch: identifier(options.branch),
        commit: identifier(options.commit),
        total_files: state.files.size,
        total_size: state.totalSize,
      },
      files: Object.fromEntries(state.files),
    };

    return { document, skipped: state.skipped, warnings: state.warnings };
  }

  private async walkDirectory(dir: string, relativeDir: string, state: WalkState): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      // Deleted or unreadable below the root: skip the subtree.
      await this.skip(state, { path: relativeDir, reason: 'unreadable-directory' }, error);
      return;
    }
    await this.walkEntries(dir, relativeDir, entries, state);
  }

  private async walkEntries(
    dir: string,
    relativeDir: string,
    entries: Dirent[],
    state: WalkState,
  ): Promise<void> {
    for (const entry of [...entries].sort(byName)) {
      const absPath = path.join(dir, entry.name);
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (isExcludedCandidate(relativePath, state.rules)) {
          await state.logger.debug(`Pruned directory ${relativePath}`);
          continue;
        }
        await this.walkDirectory(absPath, relativePath, state);
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        await this.visitFile(absPath, relativePath, entry.isSymbolicLink(), state);
      }
    }
  }

  private async visitFile(
    absPath: string,
    relativePath: string,
    isLink: boolean,
    state: WalkState,
  ): Promise<void> {
    if (state.ignorePaths.has(relativePath) || isExcludedCandidate(relativePath, state.rules)) {
      return;
    }

    let stats: Stats;
    try {
      stats = await this.fs.stat(absPath);
    } catch (error) {
      // Broken link or a race with deletion
      await this.skip(state, { path: relativePath, reason: 'stat-failed' }, error);
      return;
    }

    // Links to directories are not followed; sockets and fifos are not files.
    if (!stats.isFile()) {
      if (!isLink) {
        await state.logger.debug(`Ignored non-regular file ${relativePath}`);
      }
      return;
    }

    if (stats.size > state.maxFileSize) {
      await this.skip(state, { path: relativePath, reason: 'oversized', sizeBytes: stats.size });
      return;
    }

    let record: FileRecord;
    try {
      const { content, contentType } = await captureContent(this.fs, absPath);
      record = this.toRecord(relativePath, stats, content, contentType);
    } catch (error) {
      state.warnings.push(`Failed to read ${relativePath}: ${describeReadError(error)}`);
      await state.logger.warn(`Recording ${relativePath} as unreadable`);
      record = this.toRecord(relativePath, stats, describeReadError(error), 'error');
    }

    state.files.set(relativePath, record);
    state.totalSize += stats.size;
  }

  private toRecord(
    relativePath: string,
    stats: Stats,
    content: string,
    contentType: FileRecord['content_type'],
  ): FileRecord {
    return {
      content,
      content_type: contentType,
      mime_type: guessMimeType(relativePath),
      size: stats.size,
      modified: stats.mtime.toISOString(),
    };
  }

  private async skip(state: WalkState, skipped: SkippedFile, cause?: unknown): Promise<void> {
    state.skipped.push(skipped);
    const message =
      skipped.reason === 'oversized'
        ? `Skipping large file: ${skipped.path} (${skipped.sizeBytes} bytes)`
        : `Skipping ${skipped.path}: ${cause instanceof Error ? cause.message : String(cause)}`;
    state.warnings.push(message);
    await state.logger.debug(message);
  }
}

/**
 * Convenience wrapper around {@link CodebasePackager} with the real filesystem.
 */
export async function packageDirectory(
  root: string,
  options: PackageOptions = {},
): Promise<PackageResult> {
  return new CodebasePackager().package(root, options);
}
