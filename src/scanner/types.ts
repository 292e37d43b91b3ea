/**
 * File Discovery Types
 */

import type { FileCategory } from '../extractor/types.js';

/**
 * A discovered file, classified by extension.
 */
export interface SourceFile {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root, with forward slashes */
  relativePath: string;

  /** File extension without the dot (e.g., 'py', 'md') */
  extension: string;

  category: FileCategory;

  /** Language or format label from the classifier */
  subType: string;

  /** File size in bytes */
  size: number;
}

/**
 * Options for configuring the file scanner.
 */
export interface ScanOptions {
  /**
   * Only include files with these extensions (without dot).
   * Empty or omitted means every extension the classifier knows.
   * @example ['py', 'js']
   */
  extensions?: string[];

  /**
   * Directory names skipped at any depth.
   * @default DEFAULT_EXCLUDE_DIRS
   */
  excludeDirs?: string[];

  /**
   * Additional gitignore-style patterns (merged with .gitignore).
   * @example ['*.generated.py', 'build/']
   */
  additionalIgnorePatterns?: string[];

  /**
   * Files larger than this many bytes are skipped.
   * @default Infinity
   */
  maxFileSize?: number;

  /**
   * Maximum directory depth to traverse.
   * @default Infinity
   */
  maxDepth?: number;

  /**
   * Whether to follow symlinks.
   * @default false
   */
  followSymlinks?: boolean;

  /** Called for each discovered file, for progress reporting */
  onFile?: (file: SourceFile) => void;

  /** Called when a file is skipped because it could not be read */
  onError?: (path: string, error: Error) => void;
}

/**
 * Statistics about a completed scan.
 */
export interface ScanStats {
  totalFiles: number;

  /** Total size of discovered files in bytes */
  totalSize: number;

  byCategory: Record<FileCategory, number>;

  /** Files skipped for exceeding maxFileSize */
  skippedLarge: number;

  /** Files skipped because stat failed */
  errorsEncountered: number;

  scanDurationMs: number;
}

export interface ScanResult {
  /** Absolute root directory that was scanned */
  rootPath: string;

  /** Discovered files, sorted by relative path */
  files: SourceFile[];

  stats: ScanStats;
}

/**
 * Directory names never descended into.
 */
export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  '__pycache__',
  '.git',
  '.github',
  'venv',
  'env',
  'node_modules',
];
