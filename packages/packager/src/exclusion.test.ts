import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EXCLUSION_RULES,
  createExclusionRules,
  isExcludedCandidate,
} from './exclusion';

describe('exclusion rules', () => {
  const rules = DEFAULT_EXCLUSION_RULES;

  it('prunes excluded directory names at any depth', () => {
    expect(isExcludedCandidate('node_modules', rules)).toBe(true);
    expect(isExcludedCandidate('packages/web/.next', rules)).toBe(true);
    expect(isExcludedCandidate('src/__pycache__/nested', rules)).toBe(true);
    expect(isExcludedCandidate('src/lib', rules)).toBe(false);
  });

  it('excludes files below an excluded segment', () => {
    expect(isExcludedCandidate('node_modules/b.js', rules)).toBe(true);
    expect(isExcludedCandidate('a/dist/c.js', rules)).toBe(true);
    expect(isExcludedCandidate('.git/config', rules)).toBe(true);
  });

  it('treats the basename as a segment', () => {
    expect(isExcludedCandidate('scripts/build', rules)).toBe(true);
    expect(isExcludedCandidate('scripts/build.sh', rules)).toBe(false);
  });

  it('excludes by extension', () => {
    expect(isExcludedCandidate('notes.log', rules)).toBe(true);
    expect(isExcludedCandidate('package-lock.lock', rules)).toBe(true);
    expect(isExcludedCandidate('archive.tar.tmp', rules)).toBe(true);
    expect(isExcludedCandidate('notes.LOG', rules)).toBe(false);
  });

  it('excludes exact filenames', () => {
    expect(isExcludedCandidate('.env', rules)).toBe(true);
    expect(isExcludedCandidate('config/.env.local', rules)).toBe(true);
    expect(isExcludedCandidate('docs/.DS_Store', rules)).toBe(true);
    expect(isExcludedCandidate('.env.example', rules)).toBe(false);
  });

  it('applies extension and filename rules to directories', () => {
    expect(isExcludedCandidate('.env', rules)).toBe(true);
    expect(isExcludedCandidate('old.cache', rules)).toBe(true);
    expect(isExcludedCandidate('src/.env', rules)).toBe(true);
    expect(isExcludedCandidate('src/config', rules)).toBe(false);
  });

  it('keeps ordinary files', () => {
    expect(isExcludedCandidate('a.txt', rules)).toBe(false);
    expect(isExcludedCandidate('src/index.ts', rules)).toBe(false);
    expect(isExcludedCandidate('.gitignore', rules)).toBe(false);
  });

  it('accepts custom rule sets', () => {
    const custom = createExclusionRules({
      excludedDirs: ['vendor'],
      excludedExtensions: ['.bak'],
      excludedFiles: ['secret.txt'],
    });
    expect(isExcludedCandidate('vendor/x.go', custom)).toBe(true);
    expect(isExcludedCandidate('old.bak', custom)).toBe(true);
    expect(isExcludedCandidate('secret.txt', custom)).toBe(true);
    expect(isExcludedCandidate('node_modules/b.js', custom)).toBe(false);
    expect(isExcludedCandidate('notes.log', custom)).toBe(false);
  });
});
