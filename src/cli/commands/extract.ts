/**
 * Extract Command
 *
 * Lists the elements of one file without calling the model.
 *
 *   cexp extract app.py
 *   cexp extract build.gradle --language kotlin
 *   cexp extract app.py --source --json
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { classify } from '../../extractor/classifier.js';
import { extractElements, extractFromPath } from '../../extractor/extractor.js';
import { isCallable, type CodeElement } from '../../extractor/types.js';
import { FileNotFoundError } from '../../errors/index.js';

interface ExtractCommandOptions {
  /** Language label overriding the extension */
  language?: string;
  /** Include source text in the output */
  source?: boolean;
}

function describeElement(element: CodeElement): string {
  let line = `${chalk.cyan(element.kind)} ${chalk.bold(element.name)} ${chalk.dim(`(lines ${element.startLine}-${element.endLine})`)}`;
  if (isCallable(element)) {
    line += ` ${chalk.dim(`(${element.parameters.join(', ')})`)}`;
    if (element.hasReturnValue) {
      line += ` ${chalk.dim('→ returns')}`;
    }
  }
  return line;
}

export function createExtractCommand(getContext: () => CommandContext): Command {
  return new Command('extract')
    .argument('<file>', 'File to extract')
    .description('List the functions, classes and sections of a file')
    .option('-l, --language <label>', 'Treat the file as this language (e.g. python, go, yaml)')
    .option('--source', 'Include the source of each element')
    .action((file: string, cmdOptions: ExtractCommandOptions) => {
      const ctx = getContext();

      if (!existsSync(file) || !statSync(file).isFile()) {
        throw new FileNotFoundError(file);
      }

      const content = readFileSync(file, 'utf-8');
      const elements = cmdOptions.language
        ? extractElements(content, cmdOptions.language)
        : extractFromPath(file, content);
      const { category, subType } = classify(file);
      ctx.debug(`Classified as ${category}/${subType}`);

      if (ctx.options.json) {
        const output = elements.map(({ sourceText, ...rest }) =>
          cmdOptions.source ? { ...rest, sourceText } : rest
        );
        console.log(JSON.stringify({ file, category, subType, elements: output }, null, 2));
        return;
      }

      ctx.log(chalk.bold(`${file}`) + chalk.dim(` (${category}/${subType})`));
      ctx.log('');
      for (const element of elements) {
        ctx.log(`  ${describeElement(element)}`);
        if (element.docstring) {
          ctx.log(`    ${chalk.dim(element.docstring.split('\n')[0] ?? '')}`);
        }
        if (element.errorMessage) {
          ctx.log(`    ${chalk.red(element.errorMessage)}`);
        }
        if (cmdOptions.source) {
          ctx.log('');
          for (const line of element.sourceText.split('\n')) {
            ctx.log(`    ${line}`);
          }
          ctx.log('');
        }
      }
      ctx.log('');
      ctx.log(chalk.dim(`${elements.length} element(s)`));
    });
}
