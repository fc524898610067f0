import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the form used for document keys.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * `path.relative` with forward slashes on every platform.
 */
export function relativePosix(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Splits a relative path into its segments, whichever separator it uses.
 */
export function pathSegments(p: string): string[] {
  return normalizePath(p)
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.');
}
