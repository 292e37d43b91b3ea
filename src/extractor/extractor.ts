/**
 * Structure Extractor
 *
 * Entry points that route an input to the right extraction strategy:
 * - python: grammar-based extraction (tree-sitter)
 * - other code languages: line heuristic scanner
 * - data formats: single Data element
 * - markdown: one Section per heading
 * - everything else: single Content element
 *
 * Extraction is pure: no I/O, no console output, never throws.
 */

import { categoryForSubType, classify } from './classifier.js';
import { extractDataElements } from './data-extractor.js';
import { scanElements } from './heuristic-scanner.js';
import { extractMarkdownElements } from './markdown-extractor.js';
import { extractPythonElements } from './python-extractor.js';
import { extractTextElements } from './text-extractor.js';
import type { CodeElement, FileCategory } from './types.js';

/** The language with a full grammar */
export const NATIVE_LANGUAGE = 'python';

function extractByCategory(
  sourceText: string,
  category: FileCategory,
  subType: string
): readonly CodeElement[] {
  switch (category) {
    case 'code':
      return subType === NATIVE_LANGUAGE
        ? extractPythonElements(sourceText)
        : scanElements(sourceText, subType);
    case 'data':
      return extractDataElements(sourceText, subType);
    case 'document':
      return subType === 'markdown'
        ? extractMarkdownElements(sourceText)
        : extractTextElements(sourceText, subType);
    default:
      return extractTextElements(sourceText, subType);
  }
}

/**
 * Extract elements from raw text in a declared language.
 *
 * @param sourceText - File content
 * @param language - Sub-type label ('python', 'go', 'json', 'markdown', ...)
 *
 * @example
 * ```ts
 * extractElements('func Add(a, b int) int {\n  return a+b\n}', 'go');
 * // [{ kind: 'Function', name: 'Add', startLine: 1, endLine: 3, ... }]
 * ```
 */
export function extractElements(sourceText: string, language: string): readonly CodeElement[] {
  const lower = language.toLowerCase();
  const subType = lower === 'yml' ? 'yaml' : lower;
  return extractByCategory(sourceText, categoryForSubType(subType), subType);
}

/**
 * Classify a path by its extension and extract its content accordingly.
 */
export function extractFromPath(filePath: string, sourceText: string): readonly CodeElement[] {
  const { category, subType } = classify(filePath);
  return extractByCategory(sourceText, category, subType);
}

/**
 * Copies of the elements annotated with the file they came from, for
 * callers that merge several files into one list.
 */
export function withSourceFile(
  elements: readonly CodeElement[],
  sourceFile: string
): readonly CodeElement[] {
  return Object.freeze(elements.map((element) => Object.freeze({ ...element, sourceFile })));
}
