/**
 * Extractor Module
 *
 * File classification and structural extraction of code, data and documents.
 */

export type {
  CallableElement,
  ClassElement,
  CodeElement,
  ElementKind,
  FileCategory,
  FileClassification,
  OpaqueElement,
  OpaqueKind,
} from './types.js';
export { ELLIPSIS, PREVIEW_LIMIT, isCallable } from './types.js';

export {
  CODE_EXTENSIONS,
  DATA_EXTENSIONS,
  DOCUMENT_EXTENSIONS,
  EXTENSION_DISPLAY_NAMES,
  categoryForSubType,
  classify,
  listExtensions,
  supportedExtensions,
} from './classifier.js';

export {
  DECLARATION_PATTERNS,
  GENERIC_PATTERN,
  getDeclarationPattern,
  type DeclarationPattern,
  type HeuristicLanguage,
} from './heuristic-patterns.js';

export { scanElements } from './heuristic-scanner.js';
export { cleanDocstring, extractPythonElements } from './python-extractor.js';
export { extractDataElements } from './data-extractor.js';
export { extractMarkdownElements } from './markdown-extractor.js';
export { extractTextElements } from './text-extractor.js';
export { NATIVE_LANGUAGE, extractElements, extractFromPath, withSourceFile } from './extractor.js';
export { truncatePreview } from './utils.js';
