/**
 * Structured logging for promptdeck
 *
 * Debug and warning output only appears when PROMPTDECK_DEBUG=1, so library
 * code can report skipped files and fallbacks without cluttering command output.
 * Everything goes to stderr; stdout is reserved for command results.
 */

export type LogCategory =
  | 'config'
  | 'prompts'
  | 'modes'
  | 'publish'
  | 'workflow'
  | 'cli';

export const DEBUG_ENV_VAR = 'PROMPTDECK_DEBUG';

function isDebugEnabled(): boolean {
  return process.env[DEBUG_ENV_VAR] === '1';
}

function writeLine(level: string, category: LogCategory, message: string): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level}] [${category}] ${message}`);
}

function writeErrorDetails(error: Error): void {
  console.error(`Error: ${error.message}`);
  if (error.stack) {
    console.error(error.stack);
  }
}

/**
 * Log a debug message
 *
 * @example
 * ```typescript
 * logDebug('prompts', 'Skipping non-YAML file', { file: 'README.md' });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }
  writeLine('DEBUG', category, message);
  if (metadata) {
    console.error(JSON.stringify(metadata, null, 2));
  }
}

/**
 * Log a warning (non-critical problem)
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (!isDebugEnabled()) {
    return;
  }
  writeLine('WARN', category, message);
  if (error) {
    writeErrorDetails(error);
  }
}

/**
 * Log an error (critical failure). Always printed.
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  writeLine('ERROR', category, message);
  if (error) {
    writeErrorDetails(error);
  }
}
