/**
 * Extractor Types
 *
 * Type definitions for structural extraction. A CodeElement is a tagged
 * union on `kind`: only callable elements carry parameters and
 * return-presence, so consumers never see a meaningless flag on a class.
 */

/**
 * Coarse file category resolved from the extension.
 * - code: source files with declarations
 * - data: structured formats (json, yaml, toml, ...)
 * - document: prose and markup
 * - unknown: anything else
 */
export type FileCategory = 'code' | 'data' | 'document' | 'unknown';

/**
 * Result of classifying a file name.
 */
export interface FileClassification {
  category: FileCategory;
  /** Language or format label, e.g. 'python', 'json', 'markdown' */
  subType: string;
}

/** Element kinds produced by the extractors. */
export type ElementKind =
  | 'Function'
  | 'AsyncFunction'
  | 'Class'
  | 'Section'
  | 'Data'
  | 'Content'
  | 'File';

/** Kinds that wrap a whole input (or a prose section) rather than a declaration. */
export type OpaqueKind = 'Section' | 'Data' | 'Content' | 'File';

/**
 * Fields shared by every element.
 */
interface ElementBase {
  readonly name: string;
  /** Leading documentation; empty string when absent */
  readonly docstring: string;
  /** Verbatim span covered by the element (previews are truncated) */
  readonly sourceText: string;
  /** 1-based, inclusive */
  readonly startLine: number;
  /** 1-based, inclusive, always >= startLine */
  readonly endLine: number;
  /** Sub-type label from the classifier */
  readonly language: string;
  /** Set by batch callers, never by the extractors */
  readonly sourceFile?: string;
  /** Present on degraded fallback elements */
  readonly errorMessage?: string;
}

/**
 * A top-level function (sync or async).
 */
export interface CallableElement extends ElementBase {
  readonly kind: 'Function' | 'AsyncFunction';
  /** Positional parameter names in declaration order */
  readonly parameters: readonly string[];
  /** True when a `return <value>` appears in the body */
  readonly hasReturnValue: boolean;
}

/**
 * A top-level class (or, for the heuristic path, any non-function declaration).
 */
export interface ClassElement extends ElementBase {
  readonly kind: 'Class';
}

/**
 * Sections, data roots, plain content and whole-file fallbacks.
 */
export interface OpaqueElement extends ElementBase {
  readonly kind: OpaqueKind;
}

export type CodeElement = CallableElement | ClassElement | OpaqueElement;

/**
 * Type guard for elements that carry parameters and return-presence.
 */
export function isCallable(element: CodeElement): element is CallableElement {
  return element.kind === 'Function' || element.kind === 'AsyncFunction';
}

/** Maximum characters kept in whole-file previews */
export const PREVIEW_LIMIT = 1000;

/** Appended to previews that were cut at PREVIEW_LIMIT */
export const ELLIPSIS = '...';
