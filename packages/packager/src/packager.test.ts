import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import nodeFs from 'node:fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PackagingError } from '@repo-blob/shared';
import { CodebasePackager, packageDirectory } from './packager';
import type { PackagerFs } from './content';

const MiB = 1024 * 1024;
const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

function realFs(): PackagerFs {
  return {
    readdir: (dir, options) => nodeFs.readdir(dir, options),
    stat: (p) => nodeFs.stat(p),
    open: (p, flags) => nodeFs.open(p, flags),
  };
}

describe('CodebasePackager', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await nodeFs.mkdtemp(path.join(os.tmpdir(), 'repo-blob-packager-test-'));
  });

  afterEach(async () => {
    await nodeFs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await nodeFs.mkdir(path.dirname(fullPath), { recursive: true });
      await nodeFs.writeFile(fullPath, content);
    }
  }

  it('packs only files that pass the exclusion rules', async () => {
    await createFiles({
      'a.txt': 'hello',
      'node_modules/b.js': 'module.exports = 1;',
      'notes.log': 'log line',
      '.env': 'SECRET=test-secret',
    });

    const { document } = await packageDirectory(tmpDir);

    expect(Object.keys(document.files)).toEqual(['a.txt']);
    expect(document.metadata.total_files).toBe(1);
    expect(document.metadata.total_size).toBe(5);
  });

  it('builds complete file records', async () => {
    await createFiles({ 'a.txt': 'hello' });
    const modified = new Date('2024-01-02T03:04:05.000Z');
    await nodeFs.utimes(path.join(tmpDir, 'a.txt'), modified, modified);

    const { document } = await packageDirectory(tmpDir);

    expect(document.files['a.txt']).toEqual({
      content: 'hello',
      content_type: 'text',
      mime_type: 'text/plain',
      size: 5,
      modified: '2024-01-02T03:04:05.000Z',
    });
  });

  it('fills metadata from explicit parameters', async () => {
    await createFiles({ 'a.txt': 'hello', 'src/b.ts': 'export {};' });

    const { document } = await packageDirectory(tmpDir, {
      repository: 'octo/demo',
      branch: 'main',
      commit: 'abc123',
      now: () => FIXED_NOW,
    });

    expect(document.metadata).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      repository: 'octo/demo',
      branch: 'main',
      commit: 'abc123',
      total_files: 2,
      total_size: 15,
    });
  });

  it('defaults missing identifiers to unknown', async () => {
    await createFiles({ 'a.txt': 'hello' });

    const { document } = await packageDirectory(tmpDir, { branch: '' });

    expect(document.metadata.repository).toBe('unknown');
    expect(document.metadata.branch).toBe('unknown');
    expect(document.metadata.commit).toBe('unknown');
  });

  it('leaves out files over 1 MiB and reports them', async () => {
    await createFiles({
      'big.bin': Buffer.alloc(2 * MiB, 0x61),
      'edge.txt': Buffer.alloc(MiB, 0x62),
      'small.txt': 'ok',
    });

    const { document, skipped, warnings } = await packageDirectory(tmpDir);

    expect(Object.keys(document.files)).toEqual(['edge.txt', 'small.txt']);
    expect(document.metadata.total_files).toBe(2);
    expect(document.metadata.total_size).toBe(MiB + 2);
    expect(skipped).toEqual([{ path: 'big.bin', reason: 'oversized', sizeBytes: 2 * MiB }]);
    expect(warnings).toEqual([`Skipping large file: big.bin (${2 * MiB} bytes)`]);
  });

  it('honours a custom size ceiling', async () => {
    await createFiles({ 'ten.txt': '0123456789', 'eleven.txt': '0123456789a' });

    const { document } = await packageDirectory(tmpDir, { maxFileSize: 10 });

    expect(Object.keys(document.files)).toEqual(['ten.txt']);
  });

  it('never reads inside pruned directories', async () => {
    await createFiles({
      'node_modules/pkg/index.js': 'ignored',
      'src/.git/HEAD': 'ignored',
      'src/index.ts': 'kept',
    });
    const fs = realFs();
    const readdirSpy = vi.spyOn(fs, 'readdir');
    const statSpy = vi.spyOn(fs, 'stat');
    const openSpy = vi.spyOn(fs, 'open');

    const { document } = await new CodebasePackager(fs).package(tmpDir);

    expect(Object.keys(document.files)).toEqual(['src/index.ts']);
    const visited = [...readdirSpy.mock.calls, ...statSpy.mock.calls, ...openSpy.mock.calls].map(
      ([p]) => path.relative(tmpDir, p),
    );
    expect(visited.some((p) => p.startsWith('node_modules'))).toBe(false);
    expect(visited.some((p) => p.includes('.git'))).toBe(false);
    expect(readdirSpy).toHaveBeenCalledTimes(2);
  });

  it('prunes directories matched by extension or filename rules', async () => {
    await createFiles({
      '.env/lib/site.py': 'ignored',
      'old.cache/data.txt': 'ignored',
      'a.txt': 'kept',
    });
    const fs = realFs();
    const readdirSpy = vi.spyOn(fs, 'readdir');

    const { document } = await new CodebasePackager(fs).package(tmpDir);

    expect(Object.keys(document.files)).toEqual(['a.txt']);
    expect(readdirSpy).toHaveBeenCalledTimes(1);
    expect(readdirSpy).toHaveBeenCalledWith(tmpDir, { withFileTypes: true });
  });

  it('does not stat or open files excluded by name', async () => {
    await createFiles({ 'notes.log': 'x', '.env': 'x', 'a.txt': 'x' });
    const fs = realFs();
    const openSpy = vi.spyOn(fs, 'open');

    await new CodebasePackager(fs).package(tmpDir);

    expect(openSpy).toHaveBeenCalledTimes(1);
    expect(openSpy).toHaveBeenCalledWith(path.join(tmpDir, 'a.txt'), 'r');
  });

  it('records unreadable files as errors and keeps counting them', async () => {
    await createFiles({ 'broken.txt': '0123456789', 'ok.txt': 'fine' });
    const fs = realFs();
    fs.open = (p, flags) =>
      p.endsWith('broken.txt')
        ? Promise.reject(new Error('EACCES: permission denied'))
        : nodeFs.open(p, flags);

    const { document, warnings } = await new CodebasePackager(fs).package(tmpDir);

    expect(document.files['broken.txt']).toMatchObject({
      content: 'Error reading file: EACCES: permission denied',
      content_type: 'error',
      mime_type: 'text/plain',
      size: 10,
    });
    expect(document.files['ok.txt'].content).toBe('fine');
    expect(document.metadata.total_files).toBe(2);
    expect(document.metadata.total_size).toBe(14);
    expect(warnings).toEqual([
      'Failed to read broken.txt: Error reading file: EACCES: permission denied',
    ]);
  });

  it('classifies binary content and stores it as base64', async () => {
    const bytes = Buffer.from([0x00, 0x01, 0x02, 0xfe, 0xff]);
    await createFiles({ 'data.bin': bytes, 'script.sh': '#!/bin/sh\necho hi\n' });

    const { document } = await packageDirectory(tmpDir);

    expect(document.files['data.bin'].content_type).toBe('binary');
    expect(Buffer.from(document.files['data.bin'].content, 'base64').equals(bytes)).toBe(true);
    expect(document.files['script.sh'].content_type).toBe('text');
    expect(document.files['script.sh'].content).toBe('#!/bin/sh\necho hi\n');
  });

  it('walks in a deterministic order with forward-slash keys', async () => {
    await createFiles({
      'c.txt': 'c',
      'b.txt': 'b',
      'c/d.txt': 'd',
      'a.txt': 'a',
    });

    const { document } = await packageDirectory(tmpDir);

    expect(Object.keys(document.files)).toEqual(['a.txt', 'b.txt', 'c/d.txt', 'c.txt']);
  });

  it('keeps totals consistent with the file map', async () => {
    await createFiles({
      'one.txt': '1',
      'nested/two.md': '# two',
      'nested/deeper/three.json': '{"n":3}',
      'bin/blob.dat': Buffer.from([0x00, 0x10]),
      'dist/ignored.js': 'ignored',
    });

    const { document } = await packageDirectory(tmpDir);
    const records = Object.values(document.files);

    expect(document.metadata.total_files).toBe(records.length);
    expect(document.metadata.total_size).toBe(records.reduce((sum, r) => sum + r.size, 0));
    expect(records).toHaveLength(4);
  });

  it('skips ignored paths such as the output file', async () => {
    await createFiles({ 'codebase.json': '{}', 'a.txt': 'a' });

    const { document } = await packageDirectory(tmpDir, { ignorePaths: ['codebase.json'] });

    expect(Object.keys(document.files)).toEqual(['a.txt']);
  });

  it('follows links to files but not links to directories', async () => {
    await createFiles({ 'real/file.txt': 'linked' });
    await nodeFs.symlink(path.join(tmpDir, 'real', 'file.txt'), path.join(tmpDir, 'alias.txt'));
    await nodeFs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'alias-dir'));
    await nodeFs.symlink(path.join(tmpDir, 'missing.txt'), path.join(tmpDir, 'dangling.txt'));

    const { document, skipped } = await packageDirectory(tmpDir);

    expect(Object.keys(document.files)).toEqual(['alias.txt', 'real/file.txt']);
    expect(document.files['alias.txt'].content).toBe('linked');
    expect(skipped).toEqual([{ path: 'dangling.txt', reason: 'stat-failed' }]);
  });

  it('skips a subdirectory that cannot be listed', async () => {
    await createFiles({ 'locked/secret.txt': 'x', 'open.txt': 'y' });
    const fs = realFs();
    fs.readdir = (dir, options) =>
      dir.endsWith('locked')
        ? Promise.reject(new Error('EACCES: permission denied'))
        : nodeFs.readdir(dir, options);

    const { document, skipped } = await new CodebasePackager(fs).package(tmpDir);

    expect(Object.keys(document.files)).toEqual(['open.txt']);
    expect(skipped).toEqual([{ path: 'locked', reason: 'unreadable-directory' }]);
  });

  it('fails when the traversal root cannot be read', async () => {
    const missing = path.join(tmpDir, 'does-not-exist');

    await expect(packageDirectory(missing)).rejects.toBeInstanceOf(PackagingError);
    await expect(packageDirectory(missing)).rejects.toThrow(/Cannot read traversal root/);
  });
});
