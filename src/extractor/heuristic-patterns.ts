/**
 * Declaration signatures for the line heuristic scanner.
 *
 * One pattern per language label, plus the generic entry used for any
 * label not listed here. Adding a language is a table entry, nothing else.
 */

/**
 * A declaration signature and the capture group that holds the name.
 */
export interface DeclarationPattern {
  readonly pattern: RegExp;
  readonly nameGroup: number;
}

export type HeuristicLanguage =
  | 'javascript'
  | 'typescript'
  | 'java'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'go'
  | 'rust'
  | 'ruby'
  | 'php'
  | 'swift'
  | 'kotlin'
  | 'scala'
  | 'shell'
  | 'perl'
  | 'r'
  | 'matlab'
  | 'julia';

const named = (pattern: RegExp): DeclarationPattern => ({ pattern, nameGroup: 1 });

export const DECLARATION_PATTERNS: Readonly<Record<HeuristicLanguage, DeclarationPattern>> = {
  javascript: named(/(?:function|class|const|let|var)\s+([a-zA-Z0-9_$]+)/),
  typescript: named(/(?:function|class|interface|type|enum|const|let|var)\s+([a-zA-Z0-9_$]+)/),
  java: named(
    /(?:public|private|protected|static|final|native|synchronized|abstract|transient|class|interface|enum)\s+([a-zA-Z0-9_$<>, ]+?)[\s<{]/
  ),
  c: named(/(?:#define|typedef|struct|union|enum|void|int|char|float|double)\s+([a-zA-Z0-9_]+)/),
  cpp: named(/(?:class|struct|union|enum|namespace|template|using)\s+([a-zA-Z0-9_:]+)/),
  csharp: named(/(?:class|interface|struct|enum|delegate|namespace|using)\s+([a-zA-Z0-9_.]+)/),
  // Group 1 is the optional method receiver
  go: { pattern: /func\s+(\([^)]+\)\s+)?([a-zA-Z0-9_]+)/, nameGroup: 2 },
  rust: named(/(?:fn|struct|enum|trait|impl|mod)\s+([a-zA-Z0-9_]+)/),
  ruby: named(/(?:def|class|module)\s+([a-zA-Z0-9_]+[?!]?)/),
  php: named(/(?:function|class|interface|trait|namespace)\s+([a-zA-Z0-9_]+)/),
  swift: named(/(?:func|class|struct|enum|protocol|extension|typealias)\s+([a-zA-Z0-9_]+)/),
  kotlin: named(/(?:fun|class|interface|object|typealias|val|var)\s+([a-zA-Z0-9_]+)/),
  scala: named(/(?:def|class|trait|object|type|val|var)\s+([a-zA-Z0-9_]+)/),
  shell: named(/(?:function\s+)?([a-zA-Z0-9_]+)\s*\(\s*\)/),
  perl: named(/sub\s+([a-zA-Z0-9_]+)/),
  r: named(/([a-zA-Z0-9_.]+)\s*<-\s*function/),
  matlab: named(/function\s+(?:\[.*\]\s*=\s*)?([a-zA-Z0-9_]+)/),
  julia: named(
    /(?:function|struct|mutable\s+struct|abstract\s+type|primitive\s+type)\s+([a-zA-Z0-9_!]+)/
  ),
};

/**
 * Fallback for unlisted languages. Group 1 is the keyword itself.
 */
export const GENERIC_PATTERN: DeclarationPattern = {
  pattern: /\b(function|class|def|fn|fun|sub|proc)\s+([a-zA-Z0-9_]+)/,
  nameGroup: 2,
};

function isHeuristicLanguage(language: string): language is HeuristicLanguage {
  return Object.prototype.hasOwnProperty.call(DECLARATION_PATTERNS, language);
}

/**
 * Pattern for a language label, falling back to GENERIC_PATTERN.
 */
export function getDeclarationPattern(language: string): DeclarationPattern {
  const normalized = language.toLowerCase();
  return isHeuristicLanguage(normalized) ? DECLARATION_PATTERNS[normalized] : GENERIC_PATTERN;
}

/**
 * Line prefixes treated as comments, for every language at once.
 * (`--[` and `--[[` are covered by `--`.)
 */
export const COMMENT_PREFIXES: readonly string[] = ['//', '/*', '*', '--', '#'];

/**
 * Substrings of a lower-cased declaration line that mark it as a function.
 */
export const FUNCTION_KEYWORDS: readonly string[] = ['function', 'def ', 'fn ', 'func ', 'fun '];
