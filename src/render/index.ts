/**
 * Render Module
 */

export {
  DEFAULT_DOCUMENT_TITLE,
  createDocumentRenderer,
  describeFileCounts,
  elementHeader,
  loadDocxCapability,
  summarizeElements,
  type DocumentRenderer,
  type DocxCapability,
  type ElementSummary,
  type FileCounts,
} from './docx-renderer.js';
export { formatJsonReport, formatMarkdownReport, formatTextReport } from './report.js';
