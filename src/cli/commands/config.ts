/**
 * Config Command
 *
 * Manages ~/.code-explainer/config.toml:
 *   cexp config get <key>          - Get a specific value
 *   cexp config set <key> <value>  - Set a value (comma-separate list values)
 *   cexp config list               - Show all configuration
 *   cexp config path               - Show config file location
 *   cexp config init [--force]     - Write the commented template
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  getConfigValue,
  initConfig,
  listConfig,
  setConfigValue,
} from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., cexp config get output.style)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., cexp config set default_model codellama)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatValue(getConfigValue(key)))}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Blank line between top-level groups
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('init')
    .description('Write a commented config file with the defaults')
    .option('-f, --force', 'Overwrite an existing config file')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      const configPath = getConfigPath();
      const written = initConfig(configPath, options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: written, path: configPath }));
        return;
      }

      if (written) {
        ctx.log(`${chalk.green('✓')} Wrote ${configPath}`);
      } else {
        ctx.log(chalk.yellow(`Config file already exists: ${configPath}`));
        ctx.log(`Run with ${chalk.cyan('--force')} to overwrite it.`);
      }
    });

  return configCmd;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.join(', ');
  return JSON.stringify(value);
}
