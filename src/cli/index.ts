/**
 * Code Explainer CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands
 * for the `cexp` command.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createConfigCommand } from './commands/config.js';
import { createExplainCommand } from './commands/explain.js';
import { createExtensionsCommand } from './commands/extensions.js';
import { createExtractCommand } from './commands/extract.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// Injected at build time via tsup define
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('cexp')
  .description('Explain source files with a local Ollama model')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('cexp explain app.py')}                   Explain a file for a non-programmer
  ${chalk.cyan('cexp explain src -r -o report.docx')}    Word report for a whole tree
  ${chalk.cyan('cexp analyze src --format json')}        Per-file summaries as JSON
  ${chalk.cyan('cexp extract app.py')}                   List elements without the model
  ${chalk.cyan('cexp config set default_model mistral')} Change a setting
`);

function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createExplainCommand(getContext));
program.addCommand(createAnalyzeCommand(getContext));
program.addCommand(createExtractCommand(getContext));
program.addCommand(createExtensionsCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: cexp --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => getGlobalOptions();

  // Last resort for errors that escape the command handlers
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
