/**
 * Batch Analyzer
 *
 * Extracts each file, builds a per-file analysis prompt and asks the text
 * generator for a summary. Files run one after another; a failure on one
 * file is logged and recorded, and the batch moves on.
 */

import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { classify } from '../extractor/classifier.js';
import { extractFromPath } from '../extractor/extractor.js';
import { FileNotFoundError, GenerationError, toError } from '../errors/index.js';
import { buildFileAnalysisPrompt } from '../prompts/builder.js';
import { scanDirectory } from '../scanner/scanner.js';
import { silentLogger } from '../utils/logger.js';
import type {
  AnalyzeDirectoryOptions,
  AnalyzeOptions,
  DirectoryAnalysis,
  FileAnalysis,
} from './types.js';

async function readSource(filePath: string): Promise<string> {
  const info = await stat(filePath).catch(() => null);
  if (!info?.isFile()) {
    throw new FileNotFoundError(filePath);
  }
  return readFile(filePath, 'utf-8');
}

/**
 * Analyse one file.
 *
 * @param displayPath - Path used in the prompt and the result
 *   (defaults to filePath)
 * @throws FileNotFoundError if the path is not a readable file
 */
export async function analyzeFile(
  filePath: string,
  options: AnalyzeOptions,
  displayPath: string = filePath
): Promise<FileAnalysis> {
  const logger = options.logger ?? silentLogger;
  const source = await readSource(filePath);

  const { category, subType } = classify(filePath);
  const elements = extractFromPath(filePath, source);
  logger.debug?.(`${displayPath}: ${elements.length} element(s) as ${category}/${subType}`);

  const prompt = buildFileAnalysisPrompt(elements, displayPath, category, subType);
  const base = { filePath: displayPath, category, subType, elements };

  try {
    const analysis = await options.generator.generate(prompt, options.model);
    return { ...base, ok: true, analysis };
  } catch (error) {
    if (!(error instanceof GenerationError)) {
      throw error;
    }
    logger.warn(`Error getting analysis for ${displayPath}: ${error.message}`);
    return { ...base, ok: false, error: error.message };
  }
}

/**
 * Analyse every matching file under a directory, in relative-path order.
 *
 * @throws FileNotFoundError if rootPath is not a directory
 */
export async function analyzeDirectory(
  rootPath: string,
  options: AnalyzeDirectoryOptions
): Promise<DirectoryAnalysis> {
  const startTime = performance.now();
  const logger = options.logger ?? silentLogger;
  const absoluteRoot = resolve(rootPath);

  const info = await stat(absoluteRoot).catch(() => null);
  if (!info?.isDirectory()) {
    throw new FileNotFoundError(rootPath);
  }

  const scan = await scanDirectory(absoluteRoot, {
    extensions: options.extensions,
    excludeDirs: options.excludeDirs,
    maxFileSize: options.maxFileSize,
    onError: (path, error) => logger.warn(`Skipping ${path}: ${error.message}`),
  });
  logger.debug?.(`Found ${scan.files.length} file(s) in ${scan.stats.scanDurationMs}ms`);

  const results: FileAnalysis[] = [];
  const failed: DirectoryAnalysis['failed'] = [];

  for (const [index, file] of scan.files.entries()) {
    options.onFile?.(file.relativePath, index, scan.files.length);
    try {
      results.push(await analyzeFile(file.path, options, file.relativePath));
    } catch (error) {
      const message = toError(error).message;
      logger.warn(`Error analyzing ${file.relativePath}: ${message}`);
      failed.push({ filePath: file.relativePath, error: message });
    }
  }

  return {
    rootPath: absoluteRoot,
    results,
    failed,
    durationMs: Math.round(performance.now() - startTime),
  };
}
