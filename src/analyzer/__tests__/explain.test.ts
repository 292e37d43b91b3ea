/**
 * Tests for element collection and whole-selection explanations
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';

import { collectElements, explainElements } from '../explain.js';
import { FileNotFoundError } from '../../errors/index.js';
import { NO_ELEMENTS_MESSAGE } from '../../prompts/builder.js';
import type { TextGenerator } from '../../providers/ollama.js';

describe('collectElements', () => {
  let tempDir: string;
  let dirName: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cexp-explain-'));
    dirName = basename(tempDir);
    createFile('app.py', 'def main():\n    return 0\n\n\nclass App:\n    pass\n');
    createFile('lib/util.go', 'func Helper() {\n}\n');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(relativePath: string, content: string): string {
    const fullPath = join(tempDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
    return fullPath;
  }

  it('labels a file argument by its base name', async () => {
    const { elements, files } = await collectElements([join(tempDir, 'app.py')]);

    expect(files).toEqual(['app.py']);
    expect(elements.map((e) => [e.kind, e.name, e.sourceFile])).toEqual([
      ['Function', 'main', 'app.py'],
      ['Class', 'App', 'app.py'],
    ]);
  });

  it('only reads top-level files of a directory unless recursive', async () => {
    const flat = await collectElements([tempDir]);
    const deep = await collectElements([tempDir], { recursive: true });

    expect(flat.files).toEqual([`${dirName}/app.py`]);
    expect(deep.files).toEqual([`${dirName}/app.py`, `${dirName}/lib/util.go`]);
    expect(deep.elements.at(-1)).toMatchObject({ kind: 'Function', name: 'Helper', language: 'go' });
  });

  it('applies the extension filter', async () => {
    const { files } = await collectElements([tempDir], { recursive: true, extensions: ['go'] });

    expect(files).toEqual([`${dirName}/lib/util.go`]);
  });

  it('throws FileNotFoundError for a missing argument', async () => {
    await expect(collectElements([join(tempDir, 'nope.py')])).rejects.toBeInstanceOf(FileNotFoundError);
  });
});

describe('explainElements', () => {
  let generate: Mock<TextGenerator['generate']>;

  beforeEach(() => {
    generate = vi.fn<TextGenerator['generate']>();
  });

  it('returns the fixed message without calling the generator for no elements', async () => {
    await expect(explainElements([], { generator: { generate } })).resolves.toBe(NO_ELEMENTS_MESSAGE);
    expect(generate).not.toHaveBeenCalled();
  });

  it('sends one prompt in the requested style', async () => {
    generate.mockResolvedValue('It greets.');

    const explanation = await explainElements(
      [
        {
          kind: 'Function',
          name: 'greet',
          docstring: 'Say hello.',
          sourceText: 'def greet():\n    return "hi"',
          startLine: 1,
          endLine: 2,
          language: 'python',
          parameters: [],
          hasReturnValue: true,
        },
      ],
      { generator: { generate }, model: 'mistral', style: 'technical' }
    );

    expect(explanation).toBe('It greets.');
    const [prompt, model] = generate.mock.calls[0] ?? [];
    expect(model).toBe('mistral');
    expect(prompt).toMatch(/^You are a senior software engineer/);
    expect(prompt).toContain("# File: main.py\n\n## Function 'greet'\nLocation: Lines 1-2\nDocumentation: Say hello.\nReturns: Yes\n");
  });
});
