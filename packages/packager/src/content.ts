import type { Dirent, Stats } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { lookup } from 'mime-types';
import type { ContentType } from './types';

/** Bytes inspected for a NUL when classifying a file */
export const SNIFF_BYTES = 1024;
export const FALLBACK_MIME_TYPE = 'application/octet-stream';

/**
 * The slice of the fs API the packager touches. `node:fs/promises`
 * satisfies it; tests swap in fakes to simulate failures.
 */
export interface PackagerFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  stat(path: string): Promise<Stats>;
  open(path: string, flags: string): Promise<FileHandle>;
}

export interface CapturedContent {
  content: string;
  contentType: Exclude<ContentType, 'error'>;
}

/**
 * NUL-byte heuristic: binary if a zero byte appears in the first
 * {@link SNIFF_BYTES} bytes. Formats without a NUL in their header are
 * reported as text.
 */
export function looksBinary(sample: Uint8Array): boolean {
  return sample.subarray(0, SNIFF_BYTES).includes(0);
}

async function sniff(handle: FileHandle): Promise<boolean> {
  const buffer = Buffer.alloc(SNIFF_BYTES);
  // An explicit position leaves the handle's own position at 0 for readFile.
  const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
  return looksBinary(buffer.subarray(0, bytesRead));
}

/**
 * Reads one file through a handle that is always closed before returning.
 * Binary content is base64-encoded; text is decoded as UTF-8 with invalid
 * sequences replaced by U+FFFD. Errors propagate to the caller.
 */
export async function captureContent(fs: PackagerFs, absPath: string): Promise<CapturedContent> {
  const handle = await fs.open(absPath, 'r');
  try {
    const binary = await sniff(handle);
    const bytes = await handle.readFile();
    return binary
      ? { content: bytes.toString('base64'), contentType: 'binary' }
      : { content: bytes.toString('utf8'), contentType: 'text' };
  } finally {
    await handle.close();
  }
}

export function describeReadError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error reading file: ${message}`;
}

export function guessMimeType(filePath: string): string {
  return lookup(filePath) || FALLBACK_MIME_TYPE;
}
