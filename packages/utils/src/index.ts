/**
 * @linkgarden/utils
 *
 * Shared utilities package containing:
 * - Command execution and output streaming
 * - File operations
 * - Type guards
 * - Time helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  spawnStreaming,
  readLinesInto,
  LineQueue,
  type CommandResult,
  type CommandOptions,
  type OutputLine,
  type OutputStream,
  type ProcessExit,
  type StreamingProcess,
  type StreamingOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  safeWriteFile,
  readJsonFile,
  writeJsonFile,
  getFileSizeBytes,
  fileExists,
  resolveFrom,
} from './file.js';

// Type guards
export {
  isObject,
  isNonEmptyString,
  isDefined,
  errorMessage,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  nowIso,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
