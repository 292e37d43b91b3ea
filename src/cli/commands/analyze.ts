/**
 * Analyze Command
 *
 * Per-file summaries for a file or a whole directory tree.
 *
 *   cexp analyze                      # current directory
 *   cexp analyze src/ --extensions py go
 *   cexp analyze config.yaml --format json -o analysis.json
 */

import { statSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { analyzeDirectory, analyzeFile } from '../../analyzer/analyzer.js';
import type { FileAnalysis } from '../../analyzer/types.js';
import { loadConfig } from '../../config/loader.js';
import { resolveModel } from '../../config/env.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { createOllamaClient } from '../../providers/ollama.js';
import { formatJsonReport, formatTextReport } from '../../render/report.js';
import { createProgressReporter } from '../utils/progress.js';

interface AnalyzeCommandOptions {
  model?: string;
  output?: string;
  format: string;
  exclude?: string[];
  extensions?: string[];
}

type ReportFormat = 'text' | 'json';

function parseFormat(value: string): ReportFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new ValidationError(`Invalid --format value: "${value}"`, ['Must be one of: text, json']);
}

export function createAnalyzeCommand(getContext: () => CommandContext): Command {
  return new Command('analyze')
    .argument('[path]', 'File or directory to analyze', '.')
    .description('Summarize each file with the model')
    .option('-m, --model <name>', 'Ollama model (default: OLLAMA_MODEL or config default_model)')
    .option('-o, --output <file>', 'Write the report to a file')
    .option('-f, --format <format>', 'Report format: text or json', 'text')
    .option('--exclude <dirs...>', 'Directory names to skip (replaces the configured list)')
    .option('--extensions <exts...>', 'Extensions to include, without dots')
    .action(async (target: string, cmdOptions: AnalyzeCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      const format: ReportFormat = ctx.options.json ? 'json' : parseFormat(cmdOptions.format);
      const config = loadConfig();
      const model = resolveModel(cmdOptions.model, config.default_model);
      ctx.debug(`Model: ${model}, format: ${format}`);

      let isDirectory: boolean;
      try {
        isDirectory = statSync(target).isDirectory();
      } catch {
        throw new FileNotFoundError(target);
      }

      const generator = await createOllamaClient({ model, timeoutMs: config.ollama.timeout_ms });
      const reporter = createProgressReporter({
        json: ctx.options.json || format === 'json',
        verbose: ctx.options.verbose,
      });

      let results: FileAnalysis[];
      let failures = 0;

      reporter.startStage('generating');
      const generateStart = performance.now();
      try {
        if (isDirectory) {
          const analysis = await analyzeDirectory(target, {
            generator,
            model,
            logger: ctx,
            extensions: cmdOptions.extensions ?? config.analysis.extensions,
            excludeDirs: cmdOptions.exclude ?? config.analysis.exclude_dirs,
            maxFileSize: config.analysis.max_file_size,
            onFile: (relativePath, index, total) => {
              ctx.debug(`[${index + 1}/${total}] ${relativePath}`);
              reporter.updateProgress(index + 1, relativePath);
            },
          });
          results = analysis.results;
          failures = analysis.failed.length;
        } else {
          results = [await analyzeFile(target, { generator, model, logger: ctx })];
        }
      } catch (error) {
        reporter.failStage('Analysis failed');
        throw error;
      }
      failures += results.filter((result) => !result.ok).length;
      reporter.completeStage({
        stage: 'generating',
        processed: results.length,
        durationMs: Math.round(performance.now() - generateStart),
      });

      const report = format === 'json' ? formatJsonReport(results) : formatTextReport(results);

      if (cmdOptions.output) {
        writeFileSync(cmdOptions.output, report, 'utf-8');
        reporter.showSummary({
          filesAnalyzed: results.length,
          elementsFound: results.reduce((sum, result) => sum + result.elements.length, 0),
          failures,
          model,
          totalDurationMs: Math.round(performance.now() - startTime),
          outputPath: cmdOptions.output,
          warnings: [],
        });
        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, output: cmdOptions.output, files: results.length }));
        } else {
          ctx.log(`${chalk.green('✓')} Analysis saved to ${cmdOptions.output}`);
        }
        return;
      }

      if (results.length === 0 && format === 'text') {
        ctx.log(chalk.yellow('No matching files found.'));
        return;
      }

      console.log(report);
    });
}
