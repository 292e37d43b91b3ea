/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for any field a config file leaves
 * out. The loader merges user values ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_model: 'llama3',

  ollama: {
    timeout_ms: 120000, // local models can take a while to load
  },

  analysis: {
    exclude_dirs: ['__pycache__', '.git', '.github', 'venv', 'env', 'node_modules'],
    extensions: [],
    max_file_size: 1048576, // 1 MiB
  },

  output: {
    style: 'non-technical',
    title: 'Code Analysis Report',
  },
};

const tomlList = (values: string[]): string =>
  `[${values.map((value) => JSON.stringify(value)).join(', ')}]`;

/**
 * Config file template (TOML), written by `cexp config init`
 */
export const CONFIG_TEMPLATE = `# Code Explainer Configuration
# Location: ~/.code-explainer/config.toml

# Ollama model used when --model is not given
default_model = "${DEFAULT_CONFIG.default_model}"

# Ollama Settings
# The server address is read from OLLAMA_HOST (default http://localhost:11434)
[ollama]
timeout_ms = ${DEFAULT_CONFIG.ollama.timeout_ms}

# Directory Analysis
[analysis]
exclude_dirs = ${tomlList(DEFAULT_CONFIG.analysis.exclude_dirs)}
# extensions = ["py", "js", "md"]   # empty means every supported extension
extensions = []
max_file_size = ${DEFAULT_CONFIG.analysis.max_file_size}

# Reports
[output]
style = "${DEFAULT_CONFIG.output.style}"   # or "technical"
title = "${DEFAULT_CONFIG.output.title}"
`;
