/**
 * Error handling module for the errlens CLI
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid style', 'Use "ansi" or "plain"');
 */

// Error types
export {
  CLIError,
  ConfigError,
  ValidationError,
  ContractError,
  describeType,
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
