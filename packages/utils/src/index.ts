/**
 * @jarsmith/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Archive path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  calculateFileHash,
  getFileSizeBytes,
  isRegularFile,
  isDirectory,
  removeFile,
} from './file.js';

// Path utilities
export {
  joinEntryPath,
  toPosixPath,
  getEntryExtension,
  isDirectoryEntryName,
} from './path.js';

// Type guards
export { isErrnoException } from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
