/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for the terminal
 * - JSON output with --json
 * - Stack traces and underlying fs errors with --verbose
 */

import chalk from 'chalk';
import { CLIError, InputOpenError, OutputCreateError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  path?: string;
  stack?: string;
}

/**
 * Path carried by file errors, if any.
 */
function errorPath(error: CLIError): string | undefined {
  if (error instanceof InputOpenError || error instanceof OutputCreateError) {
    return error.path;
  }
  return undefined;
}

/**
 * Underlying fs error carried by file errors, if any.
 */
function fsErrorOf(error: CLIError): Error | undefined {
  if (error instanceof InputOpenError || error instanceof OutputCreateError) {
    return error.fsError;
  }
  return undefined;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        hint: error.hint,
        path: errorPath(error),
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    if (verbose) {
      const fsError = fsErrorOf(error);
      if (fsError) {
        lines.push(chalk.dim('Cause: ') + fsError.message);
      }
      if (error.stack) {
        lines.push('');
        lines.push(chalk.dim('Stack trace:'));
        lines.push(chalk.dim(error.stack));
      }
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler for process 'uncaughtException' / 'unhandledRejection'
 * events, with options captured at setup time.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
