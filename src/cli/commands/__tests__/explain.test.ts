/**
 * Tests for the explain command
 *
 * Extraction runs for real on temp files; the Ollama client and the config
 * loader are mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createExplainCommand } from '../explain.js';
import type { CommandContext } from '../../types.js';
import * as configLoader from '../../../config/loader.js';
import { _clearEnvCache } from '../../../config/env.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import * as ollama from '../../../providers/ollama.js';
import { GenerationError, ValidationError } from '../../../errors/index.js';
import { NO_ELEMENTS_MESSAGE } from '../../../prompts/builder.js';

vi.mock('../../../config/loader.js', () => ({
  loadConfig: vi.fn(),
}));

vi.mock('../../../providers/ollama.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../providers/ollama.js')>();
  return { ...actual, createOllamaClient: vi.fn() };
});

const reporter = vi.hoisted(() => ({
  startStage: vi.fn(),
  updateProgress: vi.fn(),
  completeStage: vi.fn(),
  failStage: vi.fn(),
  warn: vi.fn(),
  showSummary: vi.fn(),
}));

vi.mock('../../utils/progress.js', () => ({
  createProgressReporter: () => reporter,
}));

describe('createExplainCommand', () => {
  let tempDir: string;
  let sourcePath: string;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;
  let generateSpy: MockInstance<ollama.OllamaClient['generate']>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cexp-explain-cmd-'));
    sourcePath = join(tempDir, 'app.py');
    writeFileSync(sourcePath, 'def greet(name):\n    """Say hello."""\n    return "hi " + name\n');

    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    vi.stubEnv('OLLAMA_MODEL', '');
    _clearEnvCache();
    vi.mocked(configLoader.loadConfig).mockReturnValue(DEFAULT_CONFIG);

    const client = new ollama.OllamaClient({ host: 'http://ollama.test:11434' });
    generateSpy = vi.spyOn(client, 'generate').mockResolvedValue('It greets people.');
    vi.mocked(ollama.createOllamaClient).mockResolvedValue(client);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    _clearEnvCache();
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
  });

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createExplainCommand(() => context));
    await program.parseAsync(['node', 'test', 'explain', ...args]);
  }

  describe('command structure', () => {
    it('takes one or more paths', () => {
      const command = createExplainCommand(() => mockContext);
      const [paths] = command.registeredArguments;

      expect(command.name()).toBe('explain');
      expect(paths?.name()).toBe('paths');
      expect(paths?.required).toBe(true);
      expect(paths?.variadic).toBe(true);
    });

    it('has the model, style, output and recursive options', () => {
      const command = createExplainCommand(() => mockContext);
      const flags = command.options.map((o) => o.long);

      expect(flags).toEqual(
        expect.arrayContaining(['--model', '--style', '--output', '--recursive', '--title', '--prompt-only'])
      );
    });
  });

  describe('text output', () => {
    it('prints the explanation under a banner', async () => {
      await runCommand([sourcePath]);

      const banner = '='.repeat(80);
      expect(logOutput).toEqual([`\n${banner}`, 'CODE ANALYSIS REPORT', banner, 'It greets people.']);
    });

    it('sends one prompt with every element to the configured model', async () => {
      await runCommand([sourcePath]);

      expect(ollama.createOllamaClient).toHaveBeenCalledWith({ model: 'llama3', timeoutMs: 120000 });
      const [prompt, model] = generateSpy.mock.calls[0] ?? [];
      expect(model).toBe('llama3');
      expect(prompt).toContain(
        "# File: app.py\n\n## Function 'greet'\nLocation: Lines 1-3\nDocumentation: Say hello.\nArguments: name\nReturns: Yes\n"
      );
      expect(prompt).toMatch(/^You are a helpful assistant\./);
    });

    it('honours --model and --style', async () => {
      await runCommand([sourcePath, '-m', 'codellama', '--style', 'technical']);

      const [prompt, model] = generateSpy.mock.calls[0] ?? [];
      expect(model).toBe('codellama');
      expect(prompt).toMatch(/^You are a senior software engineer/);
    });

    it('rejects an unknown style', async () => {
      await expect(runCommand([sourcePath, '--style', 'poetic'])).rejects.toBeInstanceOf(ValidationError);
      expect(generateSpy).not.toHaveBeenCalled();
    });
  });

  describe('--prompt-only', () => {
    it('prints the prompt without contacting the model', async () => {
      await runCommand([sourcePath, '--prompt-only']);

      expect(ollama.createOllamaClient).not.toHaveBeenCalled();
      expect(String(consoleLogSpy.mock.calls[0]?.[0])).toContain("## Function 'greet'");
    });
  });

  describe('--output', () => {
    it('writes a Markdown report', async () => {
      const outputPath = join(tempDir, 'report.md');

      await runCommand([sourcePath, '-o', outputPath, '--title', 'Greeter']);

      expect(readFileSync(outputPath, 'utf-8')).toBe('# Greeter\n\nIt greets people.');
      expect(reporter.showSummary).toHaveBeenCalledWith(
        expect.objectContaining({ filesAnalyzed: 1, elementsFound: 1, outputPath })
      );
    });

    it('walks every progress stage in order', async () => {
      await runCommand([sourcePath, '-o', join(tempDir, 'report.md')]);

      expect(reporter.startStage.mock.calls.map(([stage]) => stage)).toEqual([
        'extracting',
        'generating',
        'rendering',
      ]);
      expect(reporter.completeStage).toHaveBeenCalledTimes(3);
    });

    it('writes a Word document for .docx', async () => {
      const outputPath = join(tempDir, 'report.docx');

      await runCommand([sourcePath, '-o', outputPath]);

      expect(existsSync(outputPath)).toBe(true);
      expect(readFileSync(outputPath).subarray(0, 2).toString('latin1')).toBe('PK');
    });
  });

  describe('JSON output', () => {
    it('prints a single JSON document', async () => {
      mockContext.options.json = true;

      await runCommand([sourcePath, '-m', 'mistral']);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output).toEqual({
        model: 'mistral',
        style: 'non-technical',
        files: ['app.py'],
        failed: [],
        elementCount: 1,
        explanation: 'It greets people.',
      });
    });
  });

  describe('edge cases', () => {
    it('reports when there is nothing to explain', async () => {
      rmSync(sourcePath);

      await runCommand([tempDir]);

      expect(ollama.createOllamaClient).not.toHaveBeenCalled();
      expect(logOutput.join('\n')).toContain(NO_ELEMENTS_MESSAGE);
    });

    it('marks the stage failed and rethrows when Ollama is unavailable', async () => {
      vi.mocked(ollama.createOllamaClient).mockRejectedValue(
        new GenerationError('Ollama server is not available at http://ollama.test:11434')
      );

      await expect(runCommand([sourcePath])).rejects.toThrow('Ollama server is not available');
      expect(reporter.failStage).toHaveBeenCalledWith('Generation failed');
    });
  });
});
