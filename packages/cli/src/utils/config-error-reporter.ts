/**
 * Shared configuration error reporting utility
 *
 * Consistent error formatting and suggestions across commands.
 */

import { CONFIG_FILE_NAME } from '@promptdeck/config';
import chalk from 'chalk';

export interface ConfigErrorDetails {
  fileName: string;
  errors: string[];
}

/**
 * Format configuration validation errors for display
 *
 * @param maxErrors Maximum number of errors to show (default: 5)
 */
export function formatConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): string[] {
  const messages: string[] = [chalk.yellow('Validation errors:')];

  for (const err of details.errors.slice(0, maxErrors)) {
    messages.push(chalk.gray(`  • ${err}`));
  }

  if (details.errors.length > maxErrors) {
    messages.push(chalk.gray(`  ... and ${details.errors.length - maxErrors} more`));
  }

  return messages;
}

export function formatConfigSuggestions(): string[] {
  return [
    chalk.blue('💡 Suggestions:'),
    chalk.gray('  • Check YAML syntax (indentation, colons, quotes)'),
    chalk.gray('  • Allowed sections: prompts, modes, tools, publish'),
    chalk.gray(`  • Remove keys not listed for a section; ${CONFIG_FILE_NAME} rejects unknown keys`),
  ];
}

/**
 * Print configuration validation errors with suggestions to stderr
 */
export function displayConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): void {
  console.error(chalk.red(`❌ Configuration is invalid: ${details.fileName}`));
  console.error();

  for (const msg of formatConfigErrors(details, maxErrors)) console.error(msg);

  console.error();

  for (const msg of formatConfigSuggestions()) console.error(msg);
}
