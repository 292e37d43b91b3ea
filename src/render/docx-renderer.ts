/**
 * Word Document Renderer
 *
 * Builds a .docx report from extracted elements and a generated
 * explanation. The docx package is loaded once at startup; the renderer is
 * constructed with the result, so "docx missing" is a value the caller can
 * check instead of an import failure deep inside a command.
 */

import type { Paragraph as DocxParagraph } from 'docx';

import { isCallable, type CodeElement } from '../extractor/types.js';
import { DEFAULT_SOURCE_FILE } from '../prompts/builder.js';
import { RenderError, toError } from '../errors/index.js';

// ============================================================================
// CAPABILITY
// ============================================================================

/**
 * The loaded docx module.
 */
export interface DocxCapability {
  readonly docx: typeof import('docx');
}

/**
 * Try to load docx. Resolves to null when the package cannot be imported.
 */
export async function loadDocxCapability(): Promise<DocxCapability | null> {
  return import('docx').then(
    (docx) => ({ docx }),
    () => null
  );
}

// ============================================================================
// SUMMARY
// ============================================================================

export interface FileCounts {
  classes: number;
  functions: number;
  asyncFunctions: number;
}

export interface ElementSummary {
  /** Per source file, in first-seen order */
  byFile: Map<string, FileCounts>;
  /** Per element kind, in first-seen order */
  byKind: Map<string, number>;
  total: number;
}

export function summarizeElements(elements: readonly CodeElement[]): ElementSummary {
  const byFile = new Map<string, FileCounts>();
  const byKind = new Map<string, number>();

  for (const element of elements) {
    const file = element.sourceFile ?? DEFAULT_SOURCE_FILE;
    let counts = byFile.get(file);
    if (!counts) {
      counts = { classes: 0, functions: 0, asyncFunctions: 0 };
      byFile.set(file, counts);
    }

    if (element.kind === 'Function') counts.functions++;
    else if (element.kind === 'AsyncFunction') counts.asyncFunctions++;
    else if (element.kind === 'Class') counts.classes++;

    byKind.set(element.kind, (byKind.get(element.kind) ?? 0) + 1);
  }

  return { byFile, byKind, total: elements.length };
}

/**
 * "2 classes, 1 functions" style line for one file.
 */
export function describeFileCounts(counts: FileCounts): string {
  const parts: string[] = [];
  if (counts.classes) parts.push(`${counts.classes} classes`);
  if (counts.functions) parts.push(`${counts.functions} functions`);
  if (counts.asyncFunctions) parts.push(`${counts.asyncFunctions} async functions`);
  return parts.length > 0 ? parts.join(', ') : 'No elements found';
}

/**
 * Heading used for one element in the Code Structure section.
 */
export function elementHeader(element: CodeElement): string {
  return `${element.kind}: ${element.name} (Lines ${element.startLine}-${element.endLine})`;
}

// ============================================================================
// RENDERER
// ============================================================================

export interface DocumentRenderer {
  /** False when docx could not be loaded */
  readonly available: boolean;

  /**
   * Render the report.
   *
   * @returns The .docx bytes, or null when docx is unavailable
   * @throws RenderError if document generation fails
   */
  render(elements: readonly CodeElement[], explanation: string, title?: string): Promise<Buffer | null>;
}

export const DEFAULT_DOCUMENT_TITLE = 'Code Analysis Report';

const SEPARATOR = '-'.repeat(40);

/** Half-points, so 20 is 10pt */
const CODE_FONT_SIZE = 20;

function buildParagraphs(
  docx: typeof import('docx'),
  elements: readonly CodeElement[],
  explanation: string,
  title: string
): DocxParagraph[] {
  const { AlignmentType, HeadingLevel, Paragraph, TextRun } = docx;

  const heading = (text: string, level: (typeof HeadingLevel)[keyof typeof HeadingLevel]) =>
    new Paragraph({ text, heading: level });
  const text = (value: string) => new Paragraph({ text: value });
  const blank = () => new Paragraph({ children: [] });
  const lines = (value: string, run: { font?: string; size?: number; italics?: boolean }) =>
    value.split('\n').map((line) => new Paragraph({ children: [new TextRun({ text: line, ...run })] }));

  const paragraphs: DocxParagraph[] = [
    new Paragraph({
      heading: HeadingLevel.TITLE,
      alignment: AlignmentType.CENTER,
      children: [new TextRun({ text: title, bold: true })],
    }),
  ];

  // Summary
  const summary = summarizeElements(elements);
  paragraphs.push(heading('Summary', HeadingLevel.HEADING_1));
  if (summary.byFile.size > 0) {
    paragraphs.push(heading('Files Analyzed', HeadingLevel.HEADING_2));
    for (const [file, counts] of summary.byFile) {
      paragraphs.push(text(`• ${file}: ${describeFileCounts(counts)}`));
    }
  }
  if (summary.total > 0) {
    paragraphs.push(text(`Total elements found: ${summary.total}`));
    for (const [kind, count] of summary.byKind) {
      paragraphs.push(new Paragraph({ text: `${kind}s: ${count}`, bullet: { level: 0 } }));
    }
  }

  // Code structure, grouped by file
  paragraphs.push(heading('Code Structure', HeadingLevel.HEADING_1));
  const byFile = new Map<string, CodeElement[]>();
  for (const element of elements) {
    const file = element.sourceFile ?? DEFAULT_SOURCE_FILE;
    byFile.set(file, [...(byFile.get(file) ?? []), element]);
  }

  for (const [file, group] of byFile) {
    paragraphs.push(heading(`File: ${file}`, HeadingLevel.HEADING_2));

    for (const element of group) {
      paragraphs.push(heading(elementHeader(element), HeadingLevel.HEADING_3));

      if (isCallable(element)) {
        if (element.parameters.length > 0) {
          paragraphs.push(text(`Arguments: ${element.parameters.join(', ')}`));
        }
        if (element.hasReturnValue) {
          paragraphs.push(text('Returns: Yes'));
        }
      }

      if (element.docstring) {
        paragraphs.push(text('Documentation:'));
        paragraphs.push(...lines(element.docstring, { italics: true }));
      }

      paragraphs.push(text('Source Code:'));
      paragraphs.push(...lines(element.sourceText, { font: 'Courier New', size: CODE_FONT_SIZE }));

      paragraphs.push(blank(), text(SEPARATOR), blank());
    }
  }

  paragraphs.push(heading('AI Explanation', HeadingLevel.HEADING_1));
  paragraphs.push(...explanation.split('\n').map(text));

  return paragraphs;
}

/**
 * Create a renderer for the given capability.
 *
 * @example
 * ```ts
 * const renderer = createDocumentRenderer(await loadDocxCapability());
 * const buffer = await renderer.render(elements, explanation);
 * if (buffer) writeFileSync('report.docx', buffer);
 * ```
 */
export function createDocumentRenderer(capability: DocxCapability | null): DocumentRenderer {
  return {
    available: capability !== null,

    async render(elements, explanation, title = DEFAULT_DOCUMENT_TITLE) {
      if (!capability) {
        return null;
      }

      const { Document, Packer } = capability.docx;
      try {
        const document = new Document({
          title,
          sections: [{ children: buildParagraphs(capability.docx, elements, explanation, title) }],
        });
        return await Packer.toBuffer(document);
      } catch (error) {
        throw new RenderError('Could not generate the Word document', toError(error));
      }
    },
  };
}
