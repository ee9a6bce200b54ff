/**
 * @reeldrop/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  startProcess,
  type CommandResult,
  type CommandOptions,
  type RunningProcess,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  getFileSizeOrNull,
  listFileNames,
  moveFile,
  removeFile,
} from './file.js';

// Path utilities
export {
  expandPath,
  sanitizeFilename,
  getExtension,
} from './path.js';

// Type guards
export { isPositiveInteger, isErrnoException } from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
