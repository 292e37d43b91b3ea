/**
 * Prompt Builder
 *
 * Turns extracted elements into prompts for the text-generation service.
 * Two shapes:
 * - explanation prompts: every element, grouped by source file, with an
 *   audience-specific instruction block (used by `cexp explain`)
 * - file analysis prompts: one file's elements with wording chosen by the
 *   file category (used by `cexp analyze`)
 */

import type { ExplanationStyle } from '../config/schema.js';
import { isCallable, type CodeElement, type FileCategory } from '../extractor/types.js';

/** Source file assumed for elements that carry none */
export const DEFAULT_SOURCE_FILE = 'main.py';

/** Returned in place of an explanation when there is nothing to explain */
export const NO_ELEMENTS_MESSAGE = 'No code elements to analyze.';

export interface ExplanationPromptOptions {
  /** @default 'non-technical' */
  style?: ExplanationStyle;
}

const STYLE_INSTRUCTIONS: Record<ExplanationStyle, { intro: string; closing: string }> = {
  'non-technical': {
    intro: [
      'You are a helpful assistant. Explain the code described below in plain,',
      'non-technical English to someone without a programming background.',
      'Avoid technical jargon. Use relatable analogies and simple examples where appropriate.',
      'Break the code down into understandable parts and describe what each part is for',
      'and how the parts work together.',
    ].join(' '),
    closing: 'Now, please provide a detailed, beginner-friendly explanation:',
  },
  technical: {
    intro: [
      'You are a senior software engineer reviewing the code described below.',
      'For each element, explain its responsibility, inputs and outputs, and how it',
      'interacts with the other elements. Point out notable design decisions and any',
      'potential defects or edge cases.',
    ].join(' '),
    closing: 'Now, please provide a concise technical explanation:',
  },
};

function formatElement(element: CodeElement): string {
  let section =
    `## ${element.kind} '${element.name}'\n` +
    `Location: Lines ${element.startLine}-${element.endLine}\n`;

  if (element.docstring) {
    section += `Documentation: ${element.docstring}\n`;
  }

  if (isCallable(element)) {
    if (element.parameters.length > 0) {
      section += `Arguments: ${element.parameters.join(', ')}\n`;
    }
    if (element.hasReturnValue) {
      section += 'Returns: Yes\n';
    }
  }

  section += `Code:\n\`\`\`${element.language}\n${element.sourceText}\n\`\`\`\n\n`;
  return section;
}

/**
 * Group elements by source file (first-seen order) and render them as
 * markdown sections.
 */
export function formatElements(elements: readonly CodeElement[]): string {
  const byFile = new Map<string, CodeElement[]>();
  for (const element of elements) {
    const file = element.sourceFile ?? DEFAULT_SOURCE_FILE;
    const group = byFile.get(file);
    if (group) {
      group.push(element);
    } else {
      byFile.set(file, [element]);
    }
  }

  const parts: string[] = [];
  for (const [file, group] of byFile) {
    parts.push(`# File: ${file}\n\n` + group.map(formatElement).join(''));
  }
  return parts.join('\n');
}

/**
 * Build the prompt that asks for an explanation of all elements.
 *
 * @example
 * ```ts
 * const prompt = buildExplanationPrompt(elements, { style: 'technical' });
 * const explanation = await client.generate(prompt);
 * ```
 */
export function buildExplanationPrompt(
  elements: readonly CodeElement[],
  options: ExplanationPromptOptions = {}
): string {
  const { intro, closing } = STYLE_INSTRUCTIONS[options.style ?? 'non-technical'];
  return `${intro}\n\n${formatElements(elements)}\n\n${closing}`;
}

function analysisInstruction(filePath: string, category: FileCategory, subType: string): string {
  switch (category) {
    case 'code':
      return (
        `Analyze the following ${subType} code from ${filePath}. ` +
        'For each element, provide a brief explanation of its purpose and functionality.'
      );
    case 'data':
      return (
        `Analyze the following ${subType.toUpperCase()} data from ${filePath}. ` +
        'Provide a summary of the data structure and its contents.'
      );
    default:
      return (
        `Analyze the following ${subType} content from ${filePath}. ` +
        'Provide a summary of the content.'
      );
  }
}

/**
 * Build the per-file analysis prompt.
 */
export function buildFileAnalysisPrompt(
  elements: readonly CodeElement[],
  filePath: string,
  category: FileCategory,
  subType: string
): string {
  let prompt = analysisInstruction(filePath, category, subType) + '\n\n';

  for (const element of elements) {
    prompt += `${element.kind} ${element.name}:\n`;
    if (element.docstring) {
      prompt += `Description: ${element.docstring}\n`;
    }
    if (element.sourceText) {
      prompt += `Content:\n${element.sourceText}\n\n`;
    }
  }

  return prompt;
}
