import chalk from 'chalk';

import { displayConfigErrors } from './config-error-reporter.js';
import { ConfigLoadError } from './config-loader.js';

/**
 * Print a failed command's error to stderr
 *
 * Invalid configuration is shown with its field errors and suggestions.
 */
export function reportCommandError(summary: string, error: unknown): void {
  if (error instanceof ConfigLoadError) {
    displayConfigErrors({ fileName: error.filePath, errors: error.errors });
    return;
  }

  console.error(chalk.red(`❌ ${summary}`));
  console.error(chalk.gray(error instanceof Error ? error.message : String(error)));
}
