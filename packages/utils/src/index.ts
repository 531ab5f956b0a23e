/**
 * @file-sorter/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Time utilities
 * - Logger factory
 */

// File operations
export {
  isErrnoException,
  errorCode,
  ensureDir,
  safeStat,
  safeWriteFile,
} from './file.js';

// Path utilities
export {
  resolveUserPath,
  getExtension,
  splitName,
} from './path.js';

// Time utilities
export {
  formatDuration,
  yearMonthSegments,
  withTimeout,
} from './time.js';

// Logger
export {
  createLogger,
  createSilentLogger,
  lowestLevel,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logger.js';
