/**
 * File Scanner
 *
 * Directory traversal with fast-glob. Discovers files with analysable
 * extensions while respecting excluded directories and .gitignore.
 */

import { statSync } from 'node:fs';
import { resolve, relative, extname, sep } from 'node:path';
import fg from 'fast-glob';

import { classify, supportedExtensions } from '../extractor/classifier.js';
import { createIgnoreFilter } from './ignore.js';
import type { ScanOptions, ScanResult, ScanStats, SourceFile } from './types.js';

function normalizeExtensions(extensions: string[] | undefined): string[] {
  const cleaned = (extensions ?? [])
    .map((ext) => ext.trim().replace(/^\./, '').toLowerCase())
    .filter((ext) => ext !== '');
  return cleaned.length > 0 ? [...new Set(cleaned)] : supportedExtensions();
}

/**
 * Glob patterns for the given extensions.
 */
function buildGlobPatterns(extensions: string[]): string[] {
  return extensions.length === 1 ? [`**/*.${extensions[0] ?? ''}`] : [`**/*.{${extensions.join(',')}}`];
}

function toSourceFile(absolutePath: string, rootPath: string, size: number): SourceFile {
  const { category, subType } = classify(absolutePath);
  return {
    path: absolutePath,
    relativePath: relative(rootPath, absolutePath).split(sep).join('/'),
    extension: extname(absolutePath).slice(1).toLowerCase(),
    category,
    subType,
    size,
  };
}

/**
 * Scan a directory for files to analyse.
 *
 * @param rootPath - Directory to scan (absolute or relative path)
 * @returns Files sorted by relative path, with statistics
 *
 * @example
 * ```ts
 * const { files } = await scanDirectory('./project', { extensions: ['py'] });
 * ```
 */
export async function scanDirectory(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const startTime = performance.now();
  const absoluteRoot = resolve(rootPath);
  const extensions = new Set(normalizeExtensions(options.extensions));
  const maxFileSize = options.maxFileSize ?? Infinity;

  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteRoot,
    excludeDirs: options.excludeDirs,
    additionalPatterns: options.additionalIgnorePatterns,
  });

  const stats: ScanStats = {
    totalFiles: 0,
    totalSize: 0,
    byCategory: { code: 0, data: 0, document: 0, unknown: 0 },
    skippedLarge: 0,
    errorsEncountered: 0,
    scanDurationMs: 0,
  };

  const entries = await fg(buildGlobPatterns([...extensions]), {
    cwd: absoluteRoot,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: options.followSymlinks ?? false,
    deep: options.maxDepth ?? Infinity,
    // classify() lower-cases extensions, so Main.Py is a Python file too
    caseSensitiveMatch: false,
    suppressErrors: true,
  });

  const files: SourceFile[] = [];
  for (const absolutePath of entries) {
    if (shouldIgnore(absolutePath)) {
      continue;
    }

    let size: number;
    try {
      size = statSync(absolutePath).size;
    } catch (error) {
      stats.errorsEncountered++;
      options.onError?.(absolutePath, error instanceof Error ? error : new Error(String(error)));
      continue;
    }

    if (size > maxFileSize) {
      stats.skippedLarge++;
      continue;
    }

    const file = toSourceFile(absolutePath, absoluteRoot, size);
    files.push(file);
    stats.totalFiles++;
    stats.totalSize += size;
    stats.byCategory[file.category]++;
    options.onFile?.(file);
  }

  files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  stats.scanDurationMs = Math.round(performance.now() - startTime);

  return { rootPath: absoluteRoot, files, stats };
}
