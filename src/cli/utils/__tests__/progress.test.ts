/**
 * ProgressReporter Tests
 *
 * Non-interactive and JSON modes; spinners need a TTY.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressReporter,
  createProgressReporter,
  formatDuration,
  truncatePath,
  type ProgressReporterOptions,
} from '../progress.js';

describe('ProgressReporter', () => {
  let errorOutput: string[];

  beforeEach(() => {
    errorOutput = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errorOutput.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const textOptions: ProgressReporterOptions = {
    json: false,
    verbose: false,
    noColor: true,
    isInteractive: false,
  };

  describe('text mode', () => {
    it('prints stage start and completion lines', () => {
      const reporter = new ProgressReporter(textOptions);

      reporter.startStage('extracting', 3);
      reporter.completeStage({ stage: 'extracting', processed: 12, durationMs: 450 });

      expect(errorOutput).toEqual(['Extracting...', 'Extracting complete: 12 elements in 450ms']);
    });

    it('reports a failed stage', () => {
      const reporter = new ProgressReporter(textOptions);

      reporter.startStage('generating');
      reporter.failStage('Ollama is not running');

      expect(errorOutput).toEqual(['Generating...', 'Generating failed: Ollama is not running']);
    });

    it('lists processed files in verbose mode', () => {
      const reporter = new ProgressReporter({ ...textOptions, verbose: true });

      reporter.startStage('extracting', 2);
      reporter.updateProgress(1, 'src/a.py');
      reporter.updateProgress(2, 'src/b.py');
      reporter.completeStage({ stage: 'extracting', processed: 4, durationMs: 1500 });

      expect(errorOutput).toEqual([
        'Extracting...',
        'Extracting complete: 4 elements in 1.5s',
        '  → src/a.py',
        '  → src/b.py',
      ]);
    });

    it('shows warnings outside a TTY', () => {
      const reporter = new ProgressReporter(textOptions);

      reporter.warn('Could not read file', 'broken.py');

      expect(errorOutput).toEqual(['Warning: Could not read file (broken.py)']);
    });

    it('prints a run summary', () => {
      const reporter = new ProgressReporter(textOptions);

      reporter.showSummary({
        filesAnalyzed: 3,
        elementsFound: 9,
        failures: 1,
        model: 'llama3',
        totalDurationMs: 65000,
        outputPath: 'report.md',
        warnings: [],
      });

      expect(errorOutput).toContain('  Files analyzed:   3');
      expect(errorOutput).toContain('  Model:            llama3');
      expect(errorOutput).toContain('  Time elapsed:     1m 5s');
      expect(errorOutput).toContain('  Report saved to:  report.md');
      expect(errorOutput).toContain('  1 file(s) failed');
    });
  });

  describe('JSON mode', () => {
    it('prints nothing', () => {
      const reporter = new ProgressReporter({ ...textOptions, json: true });

      reporter.startStage('extracting');
      reporter.updateProgress(5, 'a.py');
      reporter.warn('ignored');
      reporter.completeStage({ stage: 'extracting', processed: 5, durationMs: 10 });

      expect(errorOutput).toEqual([]);
    });
  });

  describe('createProgressReporter', () => {
    it('applies defaults', () => {
      expect(createProgressReporter({ isInteractive: false, noColor: true })).toBeInstanceOf(
        ProgressReporter
      );
    });
  });
});

describe('formatDuration', () => {
  it('formats milliseconds, seconds and minutes', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(2500)).toBe('2.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('truncatePath', () => {
  it('keeps the tail of long paths', () => {
    expect(truncatePath('short.py')).toBe('short.py');
    expect(truncatePath('a/very/long/path/to/some/deeply/nested/module.py', 20)).toBe(
      '.../nested/module.py'
    );
  });
});
