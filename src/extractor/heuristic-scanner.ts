/**
 * Line Heuristic Scanner
 *
 * Single-pass, line-oriented scanner for languages without a grammar.
 * Declaration lines (matched by a per-language signature) open a new
 * element; every following non-declaration line is appended to it, so an
 * element ends on the line before the next declaration or at end of input.
 *
 * Known precision limits, kept as-is:
 * - comment prefixes of all languages are skipped, whatever the language
 * - lines before the first declaration belong to no element
 * - Function vs Class comes from a keyword sniff, not from structure
 */

import {
  COMMENT_PREFIXES,
  FUNCTION_KEYWORDS,
  getDeclarationPattern,
} from './heuristic-patterns.js';
import type { CallableElement, ClassElement, CodeElement } from './types.js';
import { createFileFallback, freezeAll } from './utils.js';

/**
 * The element currently accumulating lines.
 */
interface PendingElement {
  kind: 'Function' | 'Class';
  name: string;
  lines: string[];
  startLine: number;
  endLine: number;
}

const RETURN_WITH_VALUE = /\breturn\s+[^\s;]/;

function isSkippable(line: string): boolean {
  return line === '' || COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix));
}

function sniffKind(line: string): 'Function' | 'Class' {
  const lower = line.toLowerCase();
  return FUNCTION_KEYWORDS.some((keyword) => lower.includes(keyword)) ? 'Function' : 'Class';
}

function finalize(pending: PendingElement, language: string): CallableElement | ClassElement {
  const base = {
    name: pending.name,
    docstring: '',
    sourceText: pending.lines.join('\n'),
    startLine: pending.startLine,
    endLine: pending.endLine,
    language,
  };

  if (pending.kind === 'Class') {
    return { ...base, kind: 'Class' };
  }

  return {
    ...base,
    kind: 'Function',
    parameters: [],
    hasReturnValue: pending.lines.some((line) => RETURN_WITH_VALUE.test(line)),
  };
}

/**
 * Scan source text for declarations of the given language.
 *
 * Never throws; input without any recognised declaration yields a single
 * `File` element holding a preview of the input.
 *
 * @example
 * ```ts
 * scanElements('func Add(a, b int) int {\n  return a+b\n}', 'go');
 * // [{ kind: 'Function', name: 'Add', startLine: 1, endLine: 3, ... }]
 * ```
 */
export function scanElements(sourceText: string, language: string): readonly CodeElement[] {
  const { pattern, nameGroup } = getDeclarationPattern(language);
  const emitted: CodeElement[] = [];
  let current: PendingElement | null = null;

  const lines = sourceText.split('\n');
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const line = (lines[index] ?? '').trim();

    if (isSkippable(line)) {
      continue;
    }

    const match = pattern.exec(line);
    if (match) {
      if (current) {
        emitted.push(finalize(current, language));
      }
      current = {
        kind: sniffKind(line),
        name: (match[nameGroup] ?? '').trim(),
        lines: [line],
        startLine: lineNumber,
        endLine: lineNumber,
      };
    } else if (current) {
      current.lines.push(line);
      current.endLine = lineNumber;
    }
  }

  if (current) {
    emitted.push(finalize(current, language));
  }

  if (emitted.length === 0) {
    return freezeAll([createFileFallback(sourceText, language, 'No structured elements found')]);
  }

  return freezeAll(emitted);
}
