/**
 * @skyrelay/utils
 *
 * Shared utilities package containing:
 * - Logger
 * - Retry logic
 * - File operations
 * - Size and time formatting
 * - Concurrency limiting
 * - Type guards
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
} from './file.js';

// Retry logic
export { retry, backoffDelay, defaultRetryOptions, type RetryOptions } from './retry.js';

// Size utilities
export {
  BYTES_PER_MB,
  BYTES_PER_GB,
  mbToBytes,
  gbToBytes,
  formatGb,
  formatMb,
} from './size.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  errorMessage,
  errorCode,
} from './guards.js';

// Time utilities
export {
  sleep,
  raceAbort,
  formatDuration,
  formatClock,
} from './time.js';

// Concurrency
export { createLimiter, type Limiter } from './concurrency.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
