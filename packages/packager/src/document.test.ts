import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PackagingError } from '@repo-blob/shared';
import { serializeDocument, summarizeDocument, writeDocument } from './document';
import type { OutputDocument } from './types';

const document: OutputDocument = {
  metadata: {
    timestamp: '2026-03-01T12:00:00.000Z',
    repository: 'octo/demo',
    branch: 'main',
    commit: 'abc123',
    total_files: 3,
    total_size: 17,
  },
  files: {
    'a.txt': {
      content: 'héllo',
      content_type: 'text',
      mime_type: 'text/plain',
      size: 6,
      modified: '2026-01-01T00:00:00.000Z',
    },
    'b.bin': {
      content: 'AAE=',
      content_type: 'binary',
      mime_type: 'application/octet-stream',
      size: 2,
      modified: '2026-01-01T00:00:00.000Z',
    },
    'c.txt': {
      content: 'Error reading file: EACCES: permission denied',
      content_type: 'error',
      mime_type: 'text/plain',
      size: 9,
      modified: '2026-01-01T00:00:00.000Z',
    },
  },
};

describe('document', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'repo-blob-document-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('serializes with two-space indentation and raw non-ASCII', () => {
    const text = serializeDocument(document);
    expect(text.startsWith('{\n  "metadata": {\n    "timestamp": "2026-03-01T12:00:00.000Z",')).toBe(
      true,
    );
    expect(text).toContain('"content": "héllo"');
    expect(JSON.parse(text)).toEqual(document);
  });

  it('writes the document and returns its byte length', async () => {
    const outputPath = path.join(tmpDir, 'out', 'codebase.json');
    const bytes = await writeDocument(document, outputPath);

    const written = await fs.readFile(outputPath, 'utf8');
    expect(written).toBe(serializeDocument(document));
    expect(bytes).toBe(Buffer.byteLength(written, 'utf8'));
  });

  it('raises a packaging error when the target cannot be written', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    await expect(writeDocument(document, path.join(blocker, 'codebase.json'))).rejects.toBeInstanceOf(
      PackagingError,
    );
  });

  it('summarizes records by content type', () => {
    expect(summarizeDocument(document)).toEqual({
      text: 1,
      binary: 1,
      error: 1,
      totalFiles: 3,
      totalSize: 17,
    });
  });
});
