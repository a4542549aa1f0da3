/**
 * @promptdeck/utils
 *
 * Common utilities for promptdeck packages.
 * This is the foundational package with NO dependencies on other promptdeck packages.
 *
 * @package @promptdeck/utils
 */

// Safe command execution (no shell, PATH resolved with which)
export {
  safeExecSync,
  isToolAvailable,
  CommandExecutionError,
  type SafeExecOptions,
} from './safe-exec.js';

// Structured logging
export {
  logDebug,
  logWarning,
  logError,
  DEBUG_ENV_VAR,
  type LogCategory,
} from './logger.js';

// Path and test helpers
export { normalizedTmpdir } from './path-helpers.js';
export { createTempTestDir, removeTempTestDir } from './test-helpers.js';
