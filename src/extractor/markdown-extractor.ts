/**
 * Markdown Extractor
 *
 * Uses the marked lexer to split a document on its headings: each heading
 * opens a `Section` holding the heading line and the body up to the next
 * heading. Lines inside fenced code blocks are never mistaken for headings.
 * Content before the first heading belongs to no section.
 */

import { marked } from 'marked';

import type { CodeElement, OpaqueElement } from './types.js';
import { createOpaqueElement, freezeAll } from './utils.js';

/** A heading located in the source text */
interface HeadingMark {
  name: string;
  offset: number;
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

/**
 * Find every top-level heading's offset in the text. The cursor moves past
 * each token so a heading's raw text is never matched inside earlier
 * content. Tokens the lexer consumes silently (link reference definitions)
 * stay in the text between offsets.
 */
function locateHeadings(text: string): HeadingMark[] {
  const marks: HeadingMark[] = [];
  let cursor = 0;

  for (const token of marked.lexer(text)) {
    if (token.raw === '') continue;
    const offset = text.indexOf(token.raw, cursor);
    if (offset === -1) continue;
    cursor = offset + token.raw.length;

    if (token.type === 'heading') {
      const title: string = token.text;
      marks.push({ name: title.trim(), offset });
    }
  }

  return marks;
}

/**
 * Extract one `Section` per heading.
 *
 * @param content - The markdown content
 * @returns Sections in document order, or a single `Content` element when
 *   the document has no headings
 *
 * @example
 * ```ts
 * extractMarkdownElements('# Title\nbody\n## Sub\nmore');
 * // [{ kind: 'Section', name: 'Title', sourceText: '# Title\nbody' },
 * //  { kind: 'Section', name: 'Sub', sourceText: '## Sub\nmore' }]
 * ```
 */
export function extractMarkdownElements(content: string): readonly CodeElement[] {
  // The lexer normalises line endings; offsets are taken in the same text
  const text = content.replace(/\r\n?/g, '\n');
  const marks = locateHeadings(text);

  const sections: OpaqueElement[] = marks.map((mark, i) => {
    const sourceText = text.slice(mark.offset, marks[i + 1]?.offset ?? text.length).trimEnd();
    const startLine = 1 + countNewlines(text.slice(0, mark.offset));
    return {
      kind: 'Section',
      name: mark.name,
      docstring: '',
      sourceText,
      startLine,
      endLine: startLine + countNewlines(sourceText),
      language: 'markdown',
    };
  });

  if (sections.length === 0) {
    return freezeAll([
      createOpaqueElement('Content', content, {
        name: 'content',
        docstring: 'Markdown content',
        language: 'markdown',
      }),
    ]);
  }

  return freezeAll(sections);
}
