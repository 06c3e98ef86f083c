/**
 * Logger Interface for Library Code
 *
 * Extraction functions accept a Logger instead of writing to the console.
 * The CLI passes its CommandContext (which satisfies Logger), tests pass
 * spies or silentLogger.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console-backed logger for library callers that want output without
 * building a context.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger, the default when nothing is injected.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
