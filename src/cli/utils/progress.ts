/**
 * Progress Reporter
 *
 * Progress display for `explain` and `analyze`:
 * - Interactive: ora spinners with per-file updates
 * - Text: one line per stage for non-TTY environments
 * - JSON: silent, the command prints a single JSON document
 *
 * Everything goes to stderr so stdout carries only the report.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Stages of a run, in the order they occur.
 */
export type ProgressStage = 'extracting' | 'generating' | 'rendering';

const STAGE_LABELS: Record<ProgressStage, string> = {
  extracting: 'Extracting',
  generating: 'Generating',
  rendering: 'Rendering',
};

const STAGE_UNITS: Record<ProgressStage, string> = {
  extracting: 'elements',
  generating: 'responses',
  rendering: 'documents',
};

export interface ProgressReporterOptions {
  /** Suppress all progress output */
  json: boolean;

  /** Show per-file lines after each stage */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stderr is a TTY (for spinner support) */
  isInteractive: boolean;
}

export interface StageStats {
  stage: ProgressStage;
  processed: number;
  durationMs: number;
}

/**
 * Totals shown after a run.
 */
export interface RunSummary {
  filesAnalyzed: number;
  elementsFound: number;
  failures: number;
  model: string;
  totalDurationMs: number;
  /** Where the report was written, when not printed */
  outputPath?: string;
  warnings: string[];
}

export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: ProgressStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected item count (0 if unknown)
   */
  startStage(stage: ProgressStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];

    if (this.options.json) return;

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.error(`${label}...`);
    }
  }

  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage || this.options.json) return;

    if (this.options.verbose && currentFile) {
      this.verboseLines.push(`  → ${currentFile}`);
    }

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const progressText =
      this.currentTotal > 0
        ? `${processed}/${this.currentTotal} (${Math.round((processed / this.currentTotal) * 100)}%)`
        : `${processed}`;

    if (this.spinner) {
      this.spinner.text = currentFile
        ? `${progressText.padEnd(15)} ${chalk.dim(truncatePath(currentFile))}`
        : progressText;
    }
  }

  completeStage(stats: StageStats): void {
    if (!this.options.json) {
      const summary = `${stats.processed.toLocaleString()} ${STAGE_UNITS[stats.stage]} in ${formatDuration(stats.durationMs)}`;

      if (this.spinner) {
        this.spinner.succeed(summary);
      } else {
        console.error(`${STAGE_LABELS[stats.stage]} complete: ${summary}`);
      }

      if (this.options.verbose && this.verboseLines.length > 0) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.error(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.error(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop the current stage with a failure mark. The error itself is
   * reported by the caller.
   */
  failStage(message: string): void {
    if (!this.options.json) {
      if (this.spinner) {
        this.spinner.fail(message);
      } else if (this.currentStage) {
        console.error(`${STAGE_LABELS[this.currentStage]} failed: ${message}`);
      }
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Non-fatal warning. Hidden under a spinner unless verbose.
   */
  warn(message: string, context?: string): void {
    if (this.options.json) return;

    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.error(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  showSummary(summary: RunSummary): void {
    if (this.options.json) return;

    console.error('');
    console.error(chalk.green.bold('Analysis Complete ✓'));
    console.error('');
    console.error(`  ${chalk.dim('Files analyzed:')}   ${summary.filesAnalyzed.toLocaleString()}`);
    console.error(`  ${chalk.dim('Elements found:')}   ${summary.elementsFound.toLocaleString()}`);
    console.error(`  ${chalk.dim('Model:')}            ${summary.model}`);
    console.error(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(summary.totalDurationMs)}`);
    if (summary.outputPath) {
      console.error(`  ${chalk.dim('Report saved to:')}  ${summary.outputPath}`);
    }

    if (summary.failures > 0) {
      console.error('');
      console.error(chalk.yellow(`  ${summary.failures} file(s) failed`));
    }

    if (summary.warnings.length > 0 && this.options.verbose) {
      for (const warning of summary.warnings.slice(0, 5)) {
        console.error(chalk.dim(`    - ${warning}`));
      }
      if (summary.warnings.length > 5) {
        console.error(chalk.dim(`    ... and ${summary.warnings.length - 5} more`));
      }
    }

    console.error('');
  }
}

/**
 * Keep the tail of long paths.
 */
export function truncatePath(path: string, maxLength: number = 40): string {
  if (path.length <= maxLength) {
    return path;
  }
  return '...' + path.slice(-(maxLength - 3));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter, detecting TTY and NO_COLOR.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stderr.isTTY ?? false),
  });
}
