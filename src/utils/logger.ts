/**
 * Logger Interface for Library Code
 *
 * Library code (the classifier, the config loader) accepts a Logger via
 * dependency injection. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() spy.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console logger used when no logger is injected.
 * Debug output goes to stderr so it never mixes with rewritten messages.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.error(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
