import type { CodeElement } from './types.js';
import { createOpaqueElement, freezeAll } from './utils.js';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Plain text, html, css and unknown formats: one `Content` element.
 */
export function extractTextElements(content: string, contentType: string): readonly CodeElement[] {
  return freezeAll([
    createOpaqueElement('Content', content, {
      name: 'content',
      docstring: `${capitalize(contentType)} content`,
      language: contentType,
    }),
  ]);
}
