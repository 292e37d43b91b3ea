/**
 * Tests for the config command
 *
 * The config path points at a temp file.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createConfigCommand } from '../config.js';
import type { CommandContext } from '../../types.js';
import * as paths from '../../../config/paths.js';
import { ConfigError } from '../../../errors/index.js';

vi.mock('../../../config/paths.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../config/paths.js')>();
  return { ...actual, getConfigPath: vi.fn() };
});

describe('createConfigCommand', () => {
  let tempDir: string;
  let configPath: string;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
    tempDir = mkdtempSync(join(tmpdir(), 'cexp-config-cmd-'));
    configPath = join(tempDir, 'config.toml');
    vi.mocked(paths.getConfigPath).mockReturnValue(configPath);

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
    rmSync(tempDir, { recursive: true, force: true });
    consoleLogSpy.mockRestore();
  });

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createConfigCommand(() => context));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  it('has get, set, list, path and init subcommands', () => {
    const command = createConfigCommand(() => mockContext);

    expect(command.commands.map((c) => c.name())).toEqual(['get', 'set', 'list', 'path', 'init']);
  });

  it('gets defaults when no file exists', async () => {
    await runCommand(['get', 'default_model']);

    expect(logOutput).toEqual(['llama3']);
  });

  it('sets a value and reads it back', async () => {
    await runCommand(['set', 'default_model', 'mistral']);
    await runCommand(['get', 'default_model']);

    expect(logOutput).toEqual(['✓ Set default_model = mistral', 'mistral']);
    expect(readFileSync(configPath, 'utf-8')).toContain('default_model = "mistral"');
  });

  it('splits list values on commas', async () => {
    await runCommand(['set', 'analysis.extensions', 'py, go']);
    await runCommand(['get', 'analysis.extensions']);

    expect(logOutput.at(-1)).toBe('py, go');
  });

  it('rejects unknown keys', async () => {
    await expect(runCommand(['get', 'nope'])).rejects.toBeInstanceOf(ConfigError);
    await expect(runCommand(['set', 'nope', '1'])).rejects.toThrow('Unknown config key: nope');
  });

  it('rejects values the schema refuses', async () => {
    await expect(runCommand(['set', 'output.style', 'poetic'])).rejects.toBeInstanceOf(ConfigError);
    expect(existsSync(configPath)).toBe(false);
  });

  it('lists every key', async () => {
    await runCommand(['list']);

    expect(logOutput).toContain('  default_model = llama3');
    expect(logOutput).toContain('  ollama.timeout_ms = 120000');
    expect(logOutput).toContain('  output.style = non-technical');
    expect(logOutput.at(-1)).toBe(`Config file: ${configPath}`);
  });

  it('prints the config path as JSON', async () => {
    mockContext.options.json = true;

    await runCommand(['path']);

    expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify({ path: configPath }));
  });

  it('writes the template once unless forced', async () => {
    await runCommand(['init']);
    await runCommand(['init']);
    await runCommand(['init', '--force']);

    expect(existsSync(configPath)).toBe(true);
    expect(logOutput).toEqual([
      `✓ Wrote ${configPath}`,
      `Config file already exists: ${configPath}`,
      'Run with --force to overwrite it.',
      `✓ Wrote ${configPath}`,
    ]);
  });
});
