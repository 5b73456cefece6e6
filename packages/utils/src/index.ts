/**
 * @clipferry/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  ensureParentDir,
  pathExists,
  isDirectory,
  removeFile,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  stripExtension,
  toPosixPath,
  joinRemote,
  remoteAncestors,
  shellQuote,
} from './path.js';

// Type guards
export {
  isObject,
  isErrnoException,
  errorMessage,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  withDeadline,
  DeadlineExceededError,
  OperationAbortedError,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
