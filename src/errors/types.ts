/**
 * Error types for the cexp CLI and library
 *
 * Every error the tool raises on purpose is a CLIError: a message, an
 * optional recovery hint, and the exit code the CLI terminates with.
 */

/**
 * Base class for all tool errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps instanceof working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when an input file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration problems: invalid TOML, unknown keys, values
 * rejected by the schema, a malformed OLLAMA_HOST.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: cexp config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when user input fails validation.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown by the text-generation service when the model server cannot be
 * reached or answers with an error. The transport or model error is kept
 * as `cause`.
 *
 * Exit code 6
 */
export class GenerationError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error, hint?: string) {
    super(message, hint ?? 'Check that Ollama is running: ollama serve', 6);
    this.name = 'GenerationError';
    this.cause = cause;
  }
}

/**
 * Thrown when a document could not be rendered or written. An absent
 * rendering library is not an error: renderers return null instead.
 *
 * Exit code 7
 */
export class RenderError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try a markdown output file instead (-o report.md)', 7);
    this.name = 'RenderError';
    this.cause = cause;
  }
}

/**
 * Normalise a thrown value into an Error, for use as a `cause`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
