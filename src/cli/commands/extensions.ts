/**
 * Extensions Command
 *
 *   cexp extensions
 *   cexp extensions --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { listExtensions } from '../../extractor/classifier.js';

const SECTIONS = [
  ['code', 'Code files'],
  ['data', 'Data files'],
  ['document', 'Document files'],
] as const;

export function createExtensionsCommand(getContext: () => CommandContext): Command {
  return new Command('extensions')
    .description('List supported file extensions')
    .action(() => {
      const ctx = getContext();

      if (ctx.options.json) {
        const output = Object.fromEntries(
          SECTIONS.map(([category]) => [category, listExtensions(category)])
        );
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(chalk.bold('Supported file extensions:'));
      for (const [category, heading] of SECTIONS) {
        ctx.log('');
        ctx.log(`${heading}:`);
        for (const { extension, name } of listExtensions(category)) {
          ctx.log(`  ${extension.padEnd(8)} - ${name}`);
        }
      }
    });
}
