import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';

import { createExtensionsCommand } from '../extensions.js';
import type { CommandContext } from '../../types.js';

describe('createExtensionsCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = originalLevel;
    consoleLogSpy.mockRestore();
  });

  async function runCommand(context = mockContext) {
    const program = new Command();
    program.addCommand(createExtensionsCommand(() => context));
    await program.parseAsync(['node', 'test', 'extensions']);
  }

  it('lists extensions by category with display names', async () => {
    await runCommand();

    expect(logOutput.slice(0, 4)).toEqual([
      'Supported file extensions:',
      '',
      'Code files:',
      '  .c       - C',
    ]);
    expect(logOutput).toContain('  .py      - Python');
    expect(logOutput).toContain('Data files:');
    expect(logOutput).toContain('  .yml     - YAML');
    expect(logOutput.at(-1)).toBe('  .txt     - Plain Text');
  });

  it('prints JSON grouped by category', async () => {
    mockContext.options.json = true;

    await runCommand();

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(Object.keys(output)).toEqual(['code', 'data', 'document']);
    expect(output.code).toHaveLength(23);
    expect(output.document).toEqual([
      { extension: '.css', name: 'CSS' },
      { extension: '.htm', name: 'HTML' },
      { extension: '.html', name: 'HTML' },
      { extension: '.md', name: 'Markdown' },
      { extension: '.txt', name: 'Plain Text' },
    ]);
  });
});
