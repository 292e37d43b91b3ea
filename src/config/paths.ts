/**
 * Centralized Path Definitions
 *
 * ~/.code-explainer/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const CONFIG_DIR = join(homedir(), '.code-explainer');
export const CONFIG_PATH = join(CONFIG_DIR, 'config.toml');

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}
