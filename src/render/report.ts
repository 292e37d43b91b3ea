/**
 * Plain-text, JSON and Markdown reports.
 */

import type { FileAnalysis } from '../analyzer/types.js';

const BANNER = '='.repeat(100);

/**
 * Human-readable report of per-file analyses.
 *
 * The element list is only printed for files with more than one element.
 */
export function formatTextReport(results: readonly FileAnalysis[]): string {
  const lines: string[] = [];

  for (const result of results) {
    lines.push(`\n${BANNER}`);
    lines.push(`File: ${result.filePath} (${result.category}/${result.subType})`);
    lines.push(`${BANNER}\n`);

    if (!result.ok) {
      lines.push(`Error: ${result.error}\n`);
      continue;
    }

    lines.push(result.analysis);

    if (result.elements.length > 1) {
      lines.push('\nElements found:');
      for (const element of result.elements) {
        lines.push(`  - ${element.kind}: ${element.name}`);
      }
    }
  }

  return lines.join('\n');
}

/**
 * JSON report keyed by file path.
 */
export function formatJsonReport(results: readonly FileAnalysis[]): string {
  const byPath: Record<string, unknown> = {};
  for (const { filePath, ...rest } of results) {
    byPath[filePath] = rest;
  }
  return JSON.stringify(byPath, null, 2);
}

/**
 * Markdown file written for `explain -o report.md`.
 */
export function formatMarkdownReport(explanation: string, title = 'Code Analysis Report'): string {
  return `# ${title}\n\n${explanation}`;
}
