import type { Logger } from '@repo-blob/shared';

/** How a file's content was captured. */
export type ContentType = 'text' | 'binary' | 'error';

/**
 * One included file. Field names follow the document format consumed
 * downstream, hence snake_case.
 */
export interface FileRecord {
  /** UTF-8 text, base64 bytes, or an error description */
  readonly content: string;
  readonly content_type: ContentType;
  readonly mime_type: string;
  /** Size in bytes as reported by stat before the read */
  readonly size: number;
  /** Last-modified time, ISO-8601 UTC */
  readonly modified: string;
}

export interface RunMetadata {
  /** Run start, ISO-8601 UTC */
  readonly timestamp: string;
  readonly repository: string;
  readonly branch: string;
  readonly commit: string;
  readonly total_files: number;
  readonly total_size: number;
}

export interface OutputDocument {
  readonly metadata: RunMetadata;
  /** Keyed by path relative to the traversal root, forward slashes */
  readonly files: Readonly<Record<string, FileRecord>>;
}

export interface ExclusionRules {
  /** Matched against every segment of a relative path */
  readonly excludedDirs: ReadonlySet<string>;
  /** Compared with `path.extname`, leading dot included */
  readonly excludedExtensions: ReadonlySet<string>;
  /** Exact basenames */
  readonly excludedFiles: ReadonlySet<string>;
}

export interface ExclusionRulesInput {
  excludedDirs?: Iterable<string>;
  excludedExtensions?: Iterable<string>;
  excludedFiles?: Iterable<string>;
}

export interface PackageOptions {
  repository?: string;
  branch?: string;
  commit?: string;
  rules?: ExclusionRulesInput;
  /** Files strictly larger than this are left out. Defaults to 1 MiB. */
  maxFileSize?: number;
  /** Relative paths never packaged, such as the output file itself */
  ignorePaths?: string[];
  now?: () => Date;
  logger?: Logger;
}

export interface SkippedFile {
  path: string;
  reason: 'oversized' | 'stat-failed' | 'unreadable-directory';
  sizeBytes?: number;
}

export interface PackageResult {
  document: OutputDocument;
  skipped: SkippedFile[];
  warnings: string[];
}
