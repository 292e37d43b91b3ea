/**
 * Logger Interface for Library Code
 *
 * Library code (the batch analyzer, the document renderer) accepts a Logger
 * instead of writing to the console. The CLI passes its CommandContext,
 * which satisfies this interface; tests pass silentLogger or a mock.
 */

export interface Logger {
  warn: (message: string) => void;
  /** Optional: not every context prints debug output */
  debug?: (message: string) => void;
}

/**
 * Used when no logger is injected.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
