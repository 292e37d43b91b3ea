/**
 * Explain Command
 *
 * One explanation for every element of the given files and directories.
 *
 *   cexp explain app.py
 *   cexp explain src/ -r --style technical
 *   cexp explain src/ -r -o report.docx
 *   cexp explain lib.go --prompt-only
 *
 * Output goes to stdout, to a Markdown file, or to a Word document when the
 * output path ends in .docx.
 */

import { writeFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { collectElements, explainElements } from '../../analyzer/explain.js';
import { loadConfig } from '../../config/loader.js';
import { resolveModel } from '../../config/env.js';
import { ExplanationStyleSchema, type ExplanationStyle } from '../../config/schema.js';
import type { CodeElement } from '../../extractor/types.js';
import { RenderError, ValidationError } from '../../errors/index.js';
import { NO_ELEMENTS_MESSAGE, buildExplanationPrompt } from '../../prompts/builder.js';
import { createOllamaClient } from '../../providers/ollama.js';
import { createDocumentRenderer, loadDocxCapability } from '../../render/docx-renderer.js';
import { formatMarkdownReport } from '../../render/report.js';
import { createProgressReporter } from '../utils/progress.js';

// ============================================================================
// Types
// ============================================================================

interface ExplainCommandOptions {
  model?: string;
  style?: string;
  output?: string;
  recursive?: boolean;
  title?: string;
  /** Print the prompt instead of calling the model */
  promptOnly?: boolean;
}

interface ExplainOutputJSON {
  model: string;
  style: ExplanationStyle;
  files: string[];
  failed: Array<{ filePath: string; error: string }>;
  elementCount: number;
  explanation: string;
  output?: string;
}

// ============================================================================
// Helpers
// ============================================================================

function parseStyle(value: string | undefined, fallback: ExplanationStyle): ExplanationStyle {
  if (value === undefined) {
    return fallback;
  }
  const result = ExplanationStyleSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid --style value: "${value}"`, [
      `Must be one of: ${ExplanationStyleSchema.options.join(', ')}`,
    ]);
  }
  return result.data;
}

/**
 * Write the explanation to `outputPath`: a Word document for .docx, Markdown
 * otherwise.
 */
async function writeReport(
  outputPath: string,
  elements: readonly CodeElement[],
  explanation: string,
  title: string
): Promise<void> {
  if (extname(outputPath).toLowerCase() !== '.docx') {
    writeFileSync(outputPath, formatMarkdownReport(explanation, title), 'utf-8');
    return;
  }

  const renderer = createDocumentRenderer(await loadDocxCapability());
  const buffer = await renderer.render(elements, explanation, title);
  if (!buffer) {
    throw new RenderError('Could not generate Word document: the docx package is not available');
  }
  writeFileSync(outputPath, buffer);
}

// ============================================================================
// Command Factory
// ============================================================================

export function createExplainCommand(getContext: () => CommandContext): Command {
  return new Command('explain')
    .argument('<paths...>', 'Files or directories to explain')
    .description('Explain the functions, classes and sections of the given files')
    .option('-m, --model <name>', 'Ollama model (default: OLLAMA_MODEL or config default_model)')
    .option('-s, --style <style>', 'Audience: non-technical or technical')
    .option('-o, --output <file>', 'Write the report to a file (.docx for a Word document)')
    .option('-r, --recursive', 'Include files in subdirectories')
    .option('-t, --title <title>', 'Report title')
    .option('--prompt-only', 'Print the prompt without calling the model')
    .action(async (paths: string[], cmdOptions: ExplainCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      const config = loadConfig();
      const style = parseStyle(cmdOptions.style, config.output.style);
      const model = resolveModel(cmdOptions.model, config.default_model);
      const title = cmdOptions.title ?? config.output.title;
      ctx.debug(`Model: ${model}, style: ${style}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      // ─────────────────────────────────────────────────────────────────────
      // 1. Extract
      // ─────────────────────────────────────────────────────────────────────
      reporter.startStage('extracting');
      const extractStart = performance.now();
      const collected = await collectElements(paths, {
        recursive: cmdOptions.recursive ?? false,
        extensions: config.analysis.extensions,
        excludeDirs: config.analysis.exclude_dirs,
        maxFileSize: config.analysis.max_file_size,
        logger: ctx,
      }).catch((error: unknown) => {
        reporter.failStage('Extraction failed');
        throw error;
      });
      reporter.completeStage({
        stage: 'extracting',
        processed: collected.elements.length,
        durationMs: Math.round(performance.now() - extractStart),
      });

      if (cmdOptions.promptOnly) {
        const prompt = buildExplanationPrompt(collected.elements, { style });
        if (ctx.options.json) {
          console.log(JSON.stringify({ prompt, files: collected.files }, null, 2));
        } else {
          console.log(prompt);
        }
        return;
      }

      if (collected.elements.length === 0) {
        if (ctx.options.json) {
          console.log(JSON.stringify({ files: collected.files, explanation: NO_ELEMENTS_MESSAGE }));
        } else {
          ctx.log(chalk.yellow(NO_ELEMENTS_MESSAGE));
        }
        return;
      }

      // ─────────────────────────────────────────────────────────────────────
      // 2. Generate
      // ─────────────────────────────────────────────────────────────────────
      reporter.startStage('generating');
      const generateStart = performance.now();
      const explanation = await createOllamaClient({ model, timeoutMs: config.ollama.timeout_ms })
        .then((client) => explainElements(collected.elements, { generator: client, model, style }))
        .catch((error: unknown) => {
          reporter.failStage('Generation failed');
          throw error;
        });
      reporter.completeStage({
        stage: 'generating',
        processed: 1,
        durationMs: Math.round(performance.now() - generateStart),
      });

      // ─────────────────────────────────────────────────────────────────────
      // 3. Output
      // ─────────────────────────────────────────────────────────────────────
      if (cmdOptions.output) {
        reporter.startStage('rendering');
        const renderStart = performance.now();
        await writeReport(cmdOptions.output, collected.elements, explanation, title).catch(
          (error: unknown) => {
            reporter.failStage('Rendering failed');
            throw error;
          }
        );
        reporter.completeStage({
          stage: 'rendering',
          processed: 1,
          durationMs: Math.round(performance.now() - renderStart),
        });
      }

      if (ctx.options.json) {
        const output: ExplainOutputJSON = {
          model,
          style,
          files: collected.files,
          failed: collected.failed,
          elementCount: collected.elements.length,
          explanation,
          output: cmdOptions.output,
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      if (cmdOptions.output) {
        reporter.showSummary({
          filesAnalyzed: collected.files.length,
          elementsFound: collected.elements.length,
          failures: collected.failed.length,
          model,
          totalDurationMs: Math.round(performance.now() - startTime),
          outputPath: cmdOptions.output,
          warnings: collected.failed.map((f) => `${f.filePath}: ${f.error}`),
        });
        ctx.log(`${chalk.green('✓')} Report saved to ${cmdOptions.output}`);
        return;
      }

      const banner = '='.repeat(80);
      ctx.log(`\n${banner}`);
      ctx.log('CODE ANALYSIS REPORT');
      ctx.log(banner);
      ctx.log(explanation);
    });
}
