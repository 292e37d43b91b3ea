/**
 * Code Explainer - Library Entry Point
 *
 * The CLI (`cexp`) covers the common workflows:
 * ```bash
 * cexp explain app.py             # Plain-English explanation
 * cexp analyze src/               # Per-file summaries
 * cexp extract app.py             # Elements only, no model
 * ```
 *
 * The same pipeline is available programmatically: classify and extract
 * without any model, then build prompts and generate with Ollama.
 *
 * @example Extraction only
 * ```typescript
 * import { extractFromPath } from 'code-explainer';
 *
 * const elements = extractFromPath('app.py', source);
 * ```
 *
 * @example Explanation
 * ```typescript
 * import { collectElements, explainElements, createOllamaClient } from 'code-explainer';
 *
 * const { elements } = await collectElements(['src'], { recursive: true });
 * const generator = await createOllamaClient({ model: 'llama3' });
 * const text = await explainElements(elements, { generator, style: 'technical' });
 * ```
 *
 * @packageDocumentation
 */

export * from './extractor/index.js';

export {
  analyzeDirectory,
  analyzeFile,
  collectElements,
  explainElements,
  type AnalyzeDirectoryOptions,
  type AnalyzeOptions,
  type CollectOptions,
  type CollectedElements,
  type DirectoryAnalysis,
  type ExplainOptions,
  type FileAnalysis,
} from './analyzer/index.js';

export {
  DEFAULT_SOURCE_FILE,
  NO_ELEMENTS_MESSAGE,
  buildExplanationPrompt,
  buildFileAnalysisPrompt,
  formatElements,
  type ExplanationPromptOptions,
} from './prompts/index.js';

export {
  OllamaClient,
  createOllamaClient,
  type TextGenerator,
  type OllamaClientOptions,
} from './providers/index.js';

export * from './render/index.js';

export { scanDirectory, type ScanOptions, type ScanResult, type SourceFile } from './scanner/index.js';

export { loadConfig, type Config, type ExplanationStyle } from './config/index.js';

export {
  CLIError,
  ConfigError,
  FileNotFoundError,
  GenerationError,
  RenderError,
  ValidationError,
} from './errors/index.js';

export type { Logger } from './utils/logger.js';
