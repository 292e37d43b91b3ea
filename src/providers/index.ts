/**
 * Text-generation providers.
 */

export {
  OllamaClient,
  createOllamaClient,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_TIMEOUT,
  type TextGenerator,
  type OllamaClientOptions,
  type CreateOllamaClientOptions,
} from './ollama.js';
export { OllamaHostSchema, validateOllamaHostUrl, type ValidationResult } from './validation.js';
