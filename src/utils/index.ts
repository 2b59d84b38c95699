/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { type Logger, consoleLogger, silentLogger } from './logger.js';
export { parseJson, extractJsonObject, isRecord } from './json.js';
export {
  withTimeout,
  isTimeoutError,
  TimeoutError,
  type TimeoutOptions,
} from './timeout.js';
export { loadDataFile, getDataFileUrl } from './data-files.js';
