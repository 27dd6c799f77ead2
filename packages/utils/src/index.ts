/**
 * @syncprobe/utils
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
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  writeExclusive,
  removeFile,
  pathExists,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  hasAllowedExtension,
  uniqueFilename,
} from './path.js';

// Type guards
export {
  isObject,
  isNonEmptyString,
} from './guards.js';

// Logger
export {
  createLogger,
  createLoggerOptions,
  type Logger,
  type LoggerSettings,
  type LogLevel,
} from './logger.js';
