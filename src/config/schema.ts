/**
 * Configuration Schema
 *
 * Defines the shape of ~/.code-explainer/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Audience of generated explanations
 */
export const ExplanationStyleSchema = z.enum(['non-technical', 'technical']);
export type ExplanationStyle = z.infer<typeof ExplanationStyleSchema>;

/**
 * Ollama connection settings (the host comes from OLLAMA_HOST)
 */
export const OllamaConfigSchema = z.object({
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one generation request (1000-600000)'),
});

/**
 * File discovery for directory analysis
 */
export const AnalysisConfigSchema = z.object({
  exclude_dirs: z.array(z.string()).describe('Directory names skipped during traversal'),
  extensions: z
    .array(z.string())
    .describe('Extensions to analyse, without dots (empty = every supported extension)'),
  max_file_size: z
    .number()
    .int()
    .min(1)
    .describe('Files larger than this many bytes are skipped'),
});

/**
 * Report defaults
 */
export const OutputConfigSchema = z.object({
  style: ExplanationStyleSchema.describe('Explanation style used by explain'),
  title: z.string().min(1).describe('Title of generated documents'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  default_model: z.string().min(1).describe('Ollama model used when --model is not given'),
  ollama: OllamaConfigSchema,
  analysis: AnalysisConfigSchema,
  output: OutputConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, for sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
