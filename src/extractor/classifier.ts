/**
 * File Type Classifier
 *
 * Pure lookup from a file extension to a coarse category and a sub-type
 * label. Only the final extension (lower-cased) is consulted; content is
 * never sniffed.
 */

import { extname } from 'node:path';

import type { FileCategory, FileClassification } from './types.js';

/**
 * Source code extensions (with dot) mapped to their language label.
 */
export const CODE_EXTENSIONS: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.c': 'c',
  '.cpp': 'cpp',
  '.h': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.go': 'go',
  '.rs': 'rust',
  '.rb': 'ruby',
  '.php': 'php',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.scala': 'scala',
  '.sh': 'shell',
  '.pl': 'perl',
  '.r': 'r',
  '.m': 'matlab',
  '.jl': 'julia',
};

/**
 * Structured data extensions mapped to their format label.
 */
export const DATA_EXTENSIONS: Record<string, string> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.xml': 'xml',
  '.csv': 'csv',
  '.toml': 'toml',
  '.ini': 'ini',
  '.cfg': 'ini',
};

/**
 * Document extensions mapped to their format label.
 */
export const DOCUMENT_EXTENSIONS: Record<string, string> = {
  '.md': 'markdown',
  '.txt': 'text',
  '.html': 'html',
  '.htm': 'html',
  '.css': 'css',
};

/**
 * Human-readable names shown by `cexp extensions`.
 */
export const EXTENSION_DISPLAY_NAMES: Record<string, string> = {
  '.py': 'Python',
  '.js': 'JavaScript',
  '.jsx': 'JavaScript (React)',
  '.ts': 'TypeScript',
  '.tsx': 'TypeScript (React)',
  '.java': 'Java',
  '.c': 'C',
  '.cpp': 'C++',
  '.h': 'C/C++ Header',
  '.hpp': 'C++ Header',
  '.cs': 'C#',
  '.go': 'Go',
  '.rs': 'Rust',
  '.rb': 'Ruby',
  '.php': 'PHP',
  '.swift': 'Swift',
  '.kt': 'Kotlin',
  '.scala': 'Scala',
  '.sh': 'Shell Script',
  '.pl': 'Perl',
  '.r': 'R',
  '.m': 'MATLAB',
  '.jl': 'Julia',
  '.json': 'JSON',
  '.yaml': 'YAML',
  '.yml': 'YAML',
  '.xml': 'XML',
  '.csv': 'CSV',
  '.toml': 'TOML',
  '.ini': 'INI',
  '.cfg': 'Config',
  '.md': 'Markdown',
  '.txt': 'Plain Text',
  '.html': 'HTML',
  '.htm': 'HTML',
  '.css': 'CSS',
};

const TABLES: Array<[Exclude<FileCategory, 'unknown'>, Record<string, string>]> = [
  ['code', CODE_EXTENSIONS],
  ['data', DATA_EXTENSIONS],
  ['document', DOCUMENT_EXTENSIONS],
];

/**
 * Classify a file name or path.
 *
 * Total: unrecognised extensions map to ('unknown', extension without dot),
 * and names without an extension to ('unknown', 'text').
 *
 * @example
 * ```ts
 * classify('src/app.py');   // { category: 'code', subType: 'python' }
 * classify('notes.xyz');    // { category: 'unknown', subType: 'xyz' }
 * classify('Makefile');     // { category: 'unknown', subType: 'text' }
 * ```
 */
export function classify(pathOrName: string): FileClassification {
  const ext = extname(pathOrName).toLowerCase();

  for (const [category, table] of TABLES) {
    const subType = table[ext];
    if (subType !== undefined) {
      return { category, subType };
    }
  }

  return { category: 'unknown', subType: ext.length > 1 ? ext.slice(1) : 'text' };
}

/**
 * Category a sub-type label belongs to, for callers that only know the
 * language (e.g. raw text submitted with a declared language).
 */
export function categoryForSubType(subType: string): FileCategory {
  const normalized = subType.toLowerCase();
  for (const [category, table] of TABLES) {
    if (Object.values(table).includes(normalized)) {
      return category;
    }
  }
  return 'unknown';
}

/**
 * All recognised extensions without the leading dot, in table order.
 */
export function supportedExtensions(): string[] {
  return TABLES.flatMap(([, table]) => Object.keys(table).map((ext) => ext.slice(1)));
}

/**
 * Extensions of one category with their display names, sorted by extension.
 */
export function listExtensions(
  category: Exclude<FileCategory, 'unknown'>
): Array<{ extension: string; name: string }> {
  const entry = TABLES.find(([c]) => c === category);
  const table = entry ? entry[1] : {};
  return Object.keys(table)
    .sort()
    .map((extension) => ({
      extension,
      name: EXTENSION_DISPLAY_NAMES[extension] ?? extension.slice(1),
    }));
}
