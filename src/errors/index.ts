/**
 * Error handling module for the asn1x CLI
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { InputOpenError, handleError } from './errors/index.js';
 *
 *   throw new InputOpenError('spec.txt');
 */

// Error types
export {
  CLIError,
  InputOpenError,
  OutputCreateError,
  NoRegionsError,
  ConfigError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
