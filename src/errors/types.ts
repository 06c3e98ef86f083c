/**
 * Error type definitions for the asn1x CLI
 *
 * These custom error classes provide:
 * - User-facing messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all CLI errors.
 *
 * `hint` tells the user how to fix the problem; `code` becomes the
 * process exit status.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when the input document cannot be opened or read.
 *
 * Covers missing files, permission problems and paths that are
 * directories.
 *
 * Exit code 1
 */
export class InputOpenError extends CLIError {
  /** Path as given by the caller */
  public readonly path: string;

  /** The underlying fs error */
  public readonly fsError?: Error;

  constructor(path: string, cause?: Error) {
    super(
      'Please check input file is correct',
      `Could not read ${path}${cause ? ` (${describeFsError(cause)})` : ''}`,
      1
    );
    this.name = 'InputOpenError';
    this.path = path;
    this.fsError = cause;
  }
}

/**
 * Thrown when an output file or directory cannot be created.
 *
 * Exit code 1
 */
export class OutputCreateError extends CLIError {
  public readonly path: string;

  public readonly fsError?: Error;

  constructor(path: string, cause?: Error) {
    super(
      'The output file can not be created here',
      `Could not write ${path}${cause ? ` (${describeFsError(cause)})` : ''}`,
      1
    );
    this.name = 'OutputCreateError';
    this.path = path;
    this.fsError = cause;
  }
}

/**
 * Thrown by split mode when the document holds no complete
 * ASN1START/ASN1STOP region.
 *
 * Exit code 1
 */
export class NoRegionsError extends CLIError {
  constructor(path: string) {
    super(
      `No ASN.1 blocks were found in ${path}`,
      'Split mode only writes regions closed by a -- ASN1STOP line',
      1
    );
    this.name = 'NoRegionsError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Unknown enum values (naming strategy, encoding)
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: asn1x config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when command-line input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Short description of a Node fs error: its errno code when present
 * (ENOENT, EACCES, EISDIR), otherwise the message.
 */
function describeFsError(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error.message;
}
