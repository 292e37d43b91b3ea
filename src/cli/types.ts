import type { Logger } from '../utils/logger.js';

/**
 * Global CLI options available to all commands
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
}

/**
 * Context passed to all command handlers. Satisfies Logger, so it can be
 * handed straight to library code.
 */
export interface CommandContext extends Logger {
  options: GlobalOptions;
  /** Log a message (suppressed under --json) */
  log: (message: string) => void;
  /** Log a debug message (only shown with --verbose) */
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
