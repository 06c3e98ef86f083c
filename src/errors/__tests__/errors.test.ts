/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Error formatting (text and JSON)
 * - Exit code extraction
 * - Verbose mode (stack traces, fs causes)
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CLIError,
  InputOpenError,
  OutputCreateError,
  NoRegionsError,
  ConfigError,
  ValidationError,
  formatError,
  getExitCode,
  handleError,
} from '../index.js';

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Retry', 99);

      expect(error.code).toBe(99);
      expect(error.hint).toBe('Retry');
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('InputOpenError', () => {
    it('carries the check-input message and exit code 1', () => {
      const error = new InputOpenError('spec.txt');

      expect(error.message).toBe('Please check input file is correct');
      expect(error.hint).toBe('Could not read spec.txt');
      expect(error.code).toBe(1);
      expect(error.name).toBe('InputOpenError');
      expect(error.path).toBe('spec.txt');
    });

    it('names the fs error code in the hint', () => {
      const cause = fsError('ENOENT', "ENOENT: no such file or directory, open 'spec.txt'");
      const error = new InputOpenError('spec.txt', cause);

      expect(error.hint).toBe('Could not read spec.txt (ENOENT)');
      expect(error.fsError).toBe(cause);
    });

    it('falls back to the cause message without a code', () => {
      const error = new InputOpenError('spec.txt', new Error('boom'));

      expect(error.hint).toBe('Could not read spec.txt (boom)');
    });

    it('is instanceof CLIError', () => {
      expect(new InputOpenError('x')).toBeInstanceOf(CLIError);
    });
  });

  describe('OutputCreateError', () => {
    it('carries the output message and exit code 1', () => {
      const error = new OutputCreateError('/ro/spec.asn', fsError('EACCES', 'permission denied'));

      expect(error.message).toBe('The output file can not be created here');
      expect(error.hint).toBe('Could not write /ro/spec.asn (EACCES)');
      expect(error.code).toBe(1);
      expect(error.name).toBe('OutputCreateError');
    });
  });

  describe('NoRegionsError', () => {
    it('names the input file', () => {
      const error = new NoRegionsError('spec.txt');

      expect(error.message).toBe('No ASN.1 blocks were found in spec.txt');
      expect(error.code).toBe(1);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint and exit code 2', () => {
      const error = new ConfigError('Invalid option');

      expect(error.hint).toBe('Run: asn1x config list  to see valid options');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });

    it('creates error with custom hint', () => {
      expect(new ConfigError('Invalid option', 'Custom hint').hint).toBe('Custom hint');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid arguments', ['naming: bad', 'split: empty']);

      expect(error.hint).toBe('Issues:\n  naming: bad\n  split: empty');
      expect(error.issues).toHaveLength(2);
      expect(error.code).toBe(1);
    });

    it('has a generic hint without issues', () => {
      expect(new ValidationError('Invalid input').hint).toBe('Check your input and try again');
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const output = formatError(new CLIError('Failed', 'Try again'));

      expect(output).toContain('Error: ');
      expect(output).toContain('Failed');
      expect(output).toContain('Hint: ');
      expect(output).toContain('Try again');
    });

    it('formats CLIError without hint', () => {
      const output = formatError(new CLIError('Failed'));

      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
    });

    it('shows the fs cause only in verbose mode', () => {
      const error = new InputOpenError('spec.txt', fsError('ENOENT', 'no such file'));

      expect(formatError(error)).not.toContain('Cause:');
      expect(formatError(error, { verbose: true })).toContain('no such file');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new CLIError('Failed'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('suggests --verbose for standard errors', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('includes the path of file errors', () => {
      const output = formatError(new OutputCreateError('out.asn'), { json: true });

      expect(JSON.parse(output)).toEqual({
        error: 'The output file can not be created here',
        code: 1,
        hint: 'Could not write out.asn',
        path: 'out.asn',
      });
    });

    it('formats ConfigError as JSON', () => {
      const parsed = JSON.parse(formatError(new ConfigError('Bad config', 'Fix it'), { json: true }));

      expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
    });

    it('includes stack in JSON verbose mode', () => {
      const parsed = JSON.parse(formatError(new CLIError('Failed'), { json: true, verbose: true }));

      expect(parsed.stack).toContain('CLIError');
    });

    it('formats unknown error as JSON', () => {
      expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new InputOpenError('x'))).toBe(1);
    expect(getExitCode(new OutputCreateError('x'))).toBe(1);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints to stderr and exits with the error code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => handleError(new ConfigError('Bad config'), { json: true })).toThrow('exit 2');

    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0])).error).toBe('Bad config');
  });
});
