/**
 * Error handling module
 *
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: opsguide config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  APIKeyError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  describeError,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
