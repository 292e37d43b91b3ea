/**
 * Environment Variable Handler
 *
 * OLLAMA_HOST and OLLAMA_MODEL, read from the process environment or a
 * local .env file (via dotenv).
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op when there is no .env file
dotenvConfig();

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export const EnvSchema = z.object({
  OLLAMA_HOST: z.string().default(DEFAULT_OLLAMA_HOST),
  OLLAMA_MODEL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached on first access; _clearEnvCache() resets it for tests.
 */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 * Empty strings count as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    OLLAMA_HOST: process.env.OLLAMA_HOST?.trim() || undefined,
    OLLAMA_MODEL: process.env.OLLAMA_MODEL?.trim() || undefined,
  });
  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * The Ollama server address (not yet validated).
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Model to use: an explicit choice, then OLLAMA_MODEL, then the config default.
 */
export function resolveModel(explicit: string | undefined, configDefault: string): string {
  const chosen = explicit?.trim();
  return chosen || getEnv('OLLAMA_MODEL') || configDefault;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

export const OLLAMA_SETUP_INSTRUCTIONS = `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/
2. Start the server:

   ollama serve

3. Pull a model:

   ollama pull llama3

4. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim();
