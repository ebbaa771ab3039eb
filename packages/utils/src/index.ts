/**
 * @splitwave/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and filename helpers
 * - Bounded concurrency
 * - Type guards
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  ensureDir,
  statFileSize,
  removeFile,
  moveFile,
  formatBytes,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  sanitizeBaseName,
  getExtension,
  getBasename,
  segmentFileName,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isNonEmptyString,
  isDefined,
  parseNumeric,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatTimecode,
  toSecondsArg,
} from './time.js';

// Concurrency
export { mapWithConcurrency } from './pool.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
