/**
 * Gitignore Pattern Handling
 *
 * Uses the 'ignore' package, which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep, isAbsolute } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_EXCLUDE_DIRS } from './types.js';

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Directory names to exclude at any depth */
  excludeDirs?: readonly string[];

  /** Additional patterns, applied after .gitignore */
  additionalPatterns?: string[];
}

/**
 * Returns true when a path should be IGNORED.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse gitignore content into patterns, dropping comments and blank lines.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Patterns from a .gitignore file; empty when there is none.
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Build the ignore filter for a root directory.
 *
 * Patterns, lowest priority first:
 * 1. excludeDirs, each as a directory pattern (`name/`)
 * 2. .gitignore in the root directory
 * 3. additionalPatterns
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/repo' });
 * shouldIgnore('lib/node_modules/pkg/index.js'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, excludeDirs = DEFAULT_EXCLUDE_DIRS, additionalPatterns = [] } = options;

  const ig: Ignore = ignore();
  ig.add(excludeDirs.map((dir) => `${dir}/`));

  const gitignorePatterns = loadGitignoreFile(join(rootPath, '.gitignore'));
  if (gitignorePatterns.length > 0) {
    ig.add(gitignorePatterns);
  }

  if (additionalPatterns.length > 0) {
    ig.add(additionalPatterns);
  }

  // 'ignore' expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = isAbsolute(filePath) ? relative(rootPath, filePath) : filePath;
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }
    if (relativePath === '' || relativePath.startsWith('..')) {
      return false;
    }
    return ig.ignores(relativePath);
  };
}
