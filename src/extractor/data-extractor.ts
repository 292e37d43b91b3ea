/**
 * Data Extractor
 *
 * Structured formats are not decomposed: each file becomes a single `Data`
 * element. JSON, YAML and TOML are parsed and re-serialised before the
 * preview is cut, so the preview is normalised even when the input is not.
 */

import * as YAML from 'yaml';
import TOML from '@iarna/toml';
import { parse as parseLosslessJson, stringify as stringifyLosslessJson } from 'lossless-json';

import type { CodeElement } from './types.js';
import { createOpaqueElement, freezeAll, truncatePreview } from './utils.js';
import { extractTextElements } from './text-extractor.js';

/**
 * Parse-and-reserialise step for one format.
 */
type Normalizer = (content: string) => string;

const NORMALIZERS: Record<string, { label: string; normalize: Normalizer }> = {
  json: {
    label: 'JSON',
    // Numbers keep their source digits
    normalize: (content) => stringifyLosslessJson(parseLosslessJson(content), undefined, 2) ?? content,
  },
  yaml: {
    label: 'YAML',
    normalize: (content) => {
      const data: unknown = YAML.parse(content);
      return YAML.stringify(data);
    },
  },
  toml: {
    label: 'TOML',
    normalize: (content) => TOML.stringify(TOML.parse(content)),
  },
};

/** Formats kept verbatim, mapped to their sentinel element name */
const RAW_FORMATS: Record<string, { label: string; name: string }> = {
  xml: { label: 'XML', name: 'xml_content' },
  csv: { label: 'CSV', name: 'csv_content' },
};

/**
 * Extract the single element describing a data file.
 *
 * @param content - Raw file content
 * @param dataType - Format label from the classifier ('json', 'yaml', ...)
 */
export function extractDataElements(content: string, dataType: string): readonly CodeElement[] {
  const format = dataType.toLowerCase() === 'yml' ? 'yaml' : dataType.toLowerCase();

  const normalizer = NORMALIZERS[format];
  if (normalizer) {
    try {
      const normalized = normalizer.normalize(content);
      return freezeAll([
        createOpaqueElement('Data', content, {
          name: 'root',
          docstring: `${normalizer.label} data`,
          language: format,
          preview: truncatePreview(normalized),
        }),
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return freezeAll([
        createOpaqueElement('Data', content, {
          name: 'content',
          docstring: `Error parsing ${format} data: ${message}`,
          language: format,
          errorMessage: message,
        }),
      ]);
    }
  }

  const raw = RAW_FORMATS[format];
  if (raw) {
    return freezeAll([
      createOpaqueElement('Data', content, {
        name: raw.name,
        docstring: `${raw.label} data`,
        language: format,
      }),
    ]);
  }

  // ini, cfg and anything else: plain content
  return extractTextElements(content, format);
}
