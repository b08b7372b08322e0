/**
 * @pack-doctor/utils
 *
 * Shared utilities package containing:
 * - File operations
 * - Retry loop
 * - Path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  isFile,
  isDirectory,
  listFiles,
  isOccupied,
  moveFile,
  copyFile,
  copyDir,
  isErrnoException,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  toPosixPath,
  getExtension,
  getBasename,
  toRelativeStem,
} from './path.js';

// Type guards
export { isInteger, isObject } from './guards.js';

// Time utilities
export {
  formatDuration,
  formatTimestamp,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
