import {
  ELLIPSIS,
  PREVIEW_LIMIT,
  type CodeElement,
  type OpaqueElement,
  type OpaqueKind,
} from './types.js';

/**
 * Cut text to PREVIEW_LIMIT characters, marking the cut with an ellipsis.
 */
export function truncatePreview(text: string, limit: number = PREVIEW_LIMIT): string {
  if (text.length <= limit) {
    return text;
  }
  return text.slice(0, limit) + ELLIPSIS;
}

/**
 * Number of lines in a string. A single trailing newline ends the last
 * line rather than opening a new one; an empty string counts as one line.
 */
export function countLines(text: string): number {
  const body = text.endsWith('\n') ? text.slice(0, -1) : text;
  return body.split('\n').length;
}

/**
 * Build a whole-input element of an opaque kind.
 */
export function createOpaqueElement(
  kind: OpaqueKind,
  content: string,
  fields: {
    name: string;
    docstring: string;
    language: string;
    preview?: string;
    errorMessage?: string;
  }
): OpaqueElement {
  const element: OpaqueElement = {
    kind,
    name: fields.name,
    docstring: fields.docstring,
    sourceText: fields.preview ?? truncatePreview(content),
    startLine: 1,
    endLine: Math.max(1, countLines(content)),
    language: fields.language,
    ...(fields.errorMessage !== undefined ? { errorMessage: fields.errorMessage } : {}),
  };
  return Object.freeze(element);
}

/**
 * The single `File` element returned when nothing structural was found.
 */
export function createFileFallback(
  content: string,
  language: string,
  docstring: string,
  errorMessage?: string
): OpaqueElement {
  return createOpaqueElement('File', content, {
    name: 'content',
    docstring,
    language,
    errorMessage,
  });
}

/**
 * Freeze every element of a freshly built list.
 */
export function freezeAll<T extends CodeElement>(elements: T[]): readonly T[] {
  for (const element of elements) {
    Object.freeze(element);
  }
  return Object.freeze(elements);
}
