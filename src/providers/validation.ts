/**
 * Ollama Host Validation
 */

import { z } from 'zod';
import { OLLAMA_SETUP_INSTRUCTIONS } from '../config/env.js';

/**
 * Discriminated result: `{ valid: true }` or the first problem with
 * instructions for fixing it.
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/**
 * Must be a valid HTTP or HTTPS URL.
 */
export const OllamaHostSchema = z
  .string()
  .url('Invalid Ollama host URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Ollama host must be an HTTP(S) URL'
  );

/**
 * Validate an Ollama host URL from any source (option, env var, default).
 *
 * @example
 * ```ts
 * const validation = validateOllamaHostUrl(options.host ?? getOllamaHost());
 * if (!validation.valid) throw new ConfigError(validation.error);
 * ```
 */
export function validateOllamaHostUrl(host: string): ValidationResult {
  const result = OllamaHostSchema.safeParse(host);

  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid Ollama host URL',
      setupInstructions: OLLAMA_SETUP_INSTRUCTIONS,
    };
  }

  return { valid: true };
}
