/**
 * Analyzer Module
 *
 * Per-file and per-directory analysis with a text generator.
 */

export { analyzeFile, analyzeDirectory } from './analyzer.js';
export type {
  AnalyzeOptions,
  AnalyzeDirectoryOptions,
  DirectoryAnalysis,
  FileAnalysis,
} from './types.js';

export { collectElements, explainElements } from './explain.js';
export type { CollectOptions, CollectedElements, ExplainOptions } from './explain.js';
