/**
 * Explanation of a whole selection of files: collect every element, build
 * one prompt, ask once.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import type { ExplanationStyle } from '../config/schema.js';
import { extractFromPath, withSourceFile } from '../extractor/extractor.js';
import type { CodeElement } from '../extractor/types.js';
import { FileNotFoundError, toError } from '../errors/index.js';
import { NO_ELEMENTS_MESSAGE, buildExplanationPrompt } from '../prompts/builder.js';
import type { TextGenerator } from '../providers/ollama.js';
import { scanDirectory } from '../scanner/scanner.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface CollectOptions {
  /** Descend into subdirectories of directory arguments */
  recursive?: boolean;
  extensions?: string[];
  excludeDirs?: string[];
  maxFileSize?: number;
  logger?: Logger;
}

export interface CollectedElements {
  /** Every element, annotated with its source file */
  elements: readonly CodeElement[];
  /** Files that were read, as labelled in `sourceFile` */
  files: string[];
  failed: Array<{ filePath: string; error: string }>;
}

export interface ExplainOptions {
  generator: TextGenerator;
  model?: string;
  style?: ExplanationStyle;
}

/**
 * Extract elements from files and directories.
 *
 * A file argument is labelled by its base name; files found in a directory
 * argument by `<directory name>/<relative path>`.
 *
 * @throws FileNotFoundError if an argument does not exist
 */
export async function collectElements(
  paths: readonly string[],
  options: CollectOptions = {}
): Promise<CollectedElements> {
  const logger = options.logger ?? silentLogger;
  const targets: Array<{ path: string; label: string }> = [];

  for (const input of paths) {
    const absolute = resolve(input);
    const info = await stat(absolute).catch(() => null);
    if (!info) {
      throw new FileNotFoundError(input);
    }

    if (info.isFile()) {
      targets.push({ path: absolute, label: basename(absolute) });
      continue;
    }

    const scan = await scanDirectory(absolute, {
      extensions: options.extensions,
      excludeDirs: options.excludeDirs,
      maxFileSize: options.maxFileSize,
      maxDepth: options.recursive ? undefined : 1,
      onError: (path, error) => logger.warn(`Skipping ${path}: ${error.message}`),
    });
    for (const file of scan.files) {
      targets.push({ path: file.path, label: `${basename(absolute)}/${file.relativePath}` });
    }
  }

  const elements: CodeElement[] = [];
  const files: string[] = [];
  const failed: CollectedElements['failed'] = [];

  for (const target of targets) {
    logger.debug?.(`Processing ${target.label}`);
    try {
      const source = await readFile(target.path, 'utf-8');
      elements.push(...withSourceFile(extractFromPath(target.path, source), target.label));
      files.push(target.label);
    } catch (error) {
      const message = toError(error).message;
      logger.warn(`Error processing ${target.label}: ${message}`);
      failed.push({ filePath: target.label, error: message });
    }
  }

  return { elements, files, failed };
}

/**
 * Generate one explanation for all elements.
 *
 * Resolves to NO_ELEMENTS_MESSAGE without calling the generator when the
 * list is empty.
 *
 * @throws GenerationError from the generator
 */
export async function explainElements(
  elements: readonly CodeElement[],
  options: ExplainOptions
): Promise<string> {
  if (elements.length === 0) {
    return NO_ELEMENTS_MESSAGE;
  }
  const prompt = buildExplanationPrompt(elements, { style: options.style });
  return options.generator.generate(prompt, options.model);
}
