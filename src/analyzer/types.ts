/**
 * Analyzer Types
 */

import type { CodeElement, FileCategory } from '../extractor/types.js';
import type { TextGenerator } from '../providers/ollama.js';
import type { Logger } from '../utils/logger.js';

interface FileAnalysisBase {
  /** Path as given (file) or relative to the scanned root (directory) */
  filePath: string;
  category: FileCategory;
  subType: string;
  elements: readonly CodeElement[];
}

/**
 * Outcome for one file. Model failures are recorded, not thrown, so one bad
 * file does not end a batch.
 */
export type FileAnalysis =
  | (FileAnalysisBase & { ok: true; analysis: string })
  | (FileAnalysisBase & { ok: false; error: string });

export interface AnalyzeOptions {
  generator: TextGenerator;
  /** Passed through to the generator; its own default applies when omitted */
  model?: string;
  logger?: Logger;
}

export interface AnalyzeDirectoryOptions extends AnalyzeOptions {
  /** Extensions without the dot; empty means every supported extension */
  extensions?: string[];
  excludeDirs?: string[];
  maxFileSize?: number;
  /** Called before each file is analysed */
  onFile?: (relativePath: string, index: number, total: number) => void;
}

export interface DirectoryAnalysis {
  rootPath: string;
  results: FileAnalysis[];
  /** Files that could not be read at all */
  failed: Array<{ filePath: string; error: string }>;
  durationMs: number;
}
