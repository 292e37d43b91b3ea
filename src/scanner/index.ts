/**
 * File discovery for directory analysis.
 */

export { scanDirectory } from './scanner.js';
export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';
export {
  DEFAULT_EXCLUDE_DIRS,
  type ScanOptions,
  type ScanResult,
  type ScanStats,
  type SourceFile,
} from './types.js';
