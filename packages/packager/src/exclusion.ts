import path from 'node:path';
import {
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXCLUDED_EXTENSIONS,
  DEFAULT_EXCLUDED_FILES,
  pathSegments,
} from '@repo-blob/shared';
import type { ExclusionRules, ExclusionRulesInput } from './types';

export const DEFAULT_EXCLUSION_RULES: ExclusionRules = createExclusionRules();

export function createExclusionRules(input: ExclusionRulesInput = {}): ExclusionRules {
  return {
    excludedDirs: new Set(input.excludedDirs ?? DEFAULT_EXCLUDED_DIRS),
    excludedExtensions: new Set(input.excludedExtensions ?? DEFAULT_EXCLUDED_EXTENSIONS),
    excludedFiles: new Set(input.excludedFiles ?? DEFAULT_EXCLUDED_FILES),
  };
}

function hasExcludedSegment(relativePath: string, rules: ExclusionRules): boolean {
  return pathSegments(relativePath).some((segment) => rules.excludedDirs.has(segment));
}

/**
 * True when a walk candidate, directory or file, is left out. Any excluded
 * segment counts (the basename included, so a file named `build` goes too),
 * then the extension, then the exact basename. An excluded directory is
 * pruned and never listed.
 */
export function isExcludedCandidate(relativePath: string, rules: ExclusionRules): boolean {
  if (hasExcludedSegment(relativePath, rules)) {
    return true;
  }

  const basename = path.posix.basename(relativePath);
  // extname('.env') is '' so dotfiles only match through excludedFiles
  if (rules.excludedExtensions.has(path.posix.extname(basename))) {
    return true;
  }

  return rules.excludedFiles.has(basename);
}
