/**
 * Configuration Loader
 *
 * Config lifecycle:
 * 1. Load config.toml if it exists (or write the template on request)
 * 2. Validate with the partial Zod schema
 * 3. Merge with defaults (user values override defaults)
 *
 * Every function takes an optional path so tests can point at a temp file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';

import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type TomlValue = TOML.JsonMap[string];

export interface LoadConfigOptions {
  /** Config file location (default ~/.code-explainer/config.toml) */
  configPath?: string;
  /** Write the commented template when the file is missing */
  createIfMissing?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTomlMap(value: TomlValue | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * User values over defaults, section by section
 */
function mergeConfig(base: Config, user: PartialConfig): Config {
  return {
    default_model: user.default_model ?? base.default_model,
    ollama: {
      timeout_ms: user.ollama?.timeout_ms ?? base.ollama.timeout_ms,
    },
    analysis: {
      exclude_dirs: user.analysis?.exclude_dirs ?? base.analysis.exclude_dirs,
      extensions: user.analysis?.extensions ?? base.analysis.extensions,
      max_file_size: user.analysis?.max_file_size ?? base.analysis.max_file_size,
    },
    output: {
      style: user.output?.style ?? base.output.style,
      title: user.output?.title ?? base.output.title,
    },
  };
}

function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: cexp config init --force`
    );
  }
}

/**
 * Write the config template.
 *
 * @returns false when the file already exists and `force` is not set
 */
export function initConfig(configPath: string = getConfigPath(), force = false): boolean {
  if (fs.existsSync(configPath) && !force) {
    return false;
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return true;
}

/**
 * Load the merged config (defaults + user overrides).
 *
 * @throws ConfigError if the file exists but is not valid TOML or fails the schema
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (options.createIfMissing) {
      initConfig(configPath);
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const result = PartialConfigSchema.safeParse(readToml(configPath));
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(result.error.issues)}`,
      'Run: cexp config init --force  to restore defaults'
    );
  }

  return mergeConfig(DEFAULT_CONFIG, result.data);
}

/**
 * Read a value by dot-notation path from any object.
 */
function valueAtPath(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a config value by dot-notation path.
 *
 * @example
 * ```ts
 * getConfigValue('analysis.max_file_size'); // 1048576
 * ```
 */
export function getConfigValue(key: string, configPath?: string): unknown {
  return valueAtPath(loadConfig({ configPath }), key);
}

/**
 * Convert a command-line string into the type the key expects.
 * Keys whose default is a list take comma-separated values.
 */
function parseValue(key: string, value: string): TomlValue {
  if (Array.isArray(valueAtPath(DEFAULT_CONFIG, key))) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }

  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write the file back.
 *
 * @throws ConfigError for unknown keys and for values the schema rejects
 */
export function setConfigValue(key: string, value: string, configPath: string = getConfigPath()): void {
  const known = valueAtPath(DEFAULT_CONFIG, key);
  if (known === undefined || isRecord(known)) {
    throw new ConfigError(`Unknown config key: ${key}`, 'Run: cexp config list  to see available keys');
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  const parts = key.split('.');
  const last = parts.pop() ?? key;
  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlMap(next)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = parseValue(key, value);

  // Validate the complete config before saving
  const partial = PartialConfigSchema.safeParse(config);
  const full = partial.success
    ? ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data))
    : partial;
  if (!full.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(full.error.issues)}`,
      'Run: cexp config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * All config values as flat [key, value] pairs.
 *
 * @example
 * ```ts
 * listConfig(); // [['default_model', 'llama3'], ['ollama.timeout_ms', 120000], ...]
 * ```
 */
export function listConfig(configPath?: string): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig({ configPath }));
  return entries;
}
