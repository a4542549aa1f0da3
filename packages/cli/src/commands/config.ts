/**
 * Config Command
 *
 * Show or validate promptdeck configuration.
 */

import { basename } from 'node:path';

import { CONFIG_FILE_NAME, type ProjectConfig } from '@promptdeck/config';
import chalk from 'chalk';
import type { Command } from 'commander';
import { stringify as yamlStringify } from 'yaml';

import { displayConfigErrors } from '../utils/config-error-reporter.js';
import { loadConfigWithErrors } from '../utils/config-loader.js';
import { reportCommandError } from '../utils/report-error.js';

type ConfigCheck =
  | { ok: true; configPath: string; config: ProjectConfig }
  | { ok: false };

async function loadAndValidateConfig(): Promise<ConfigCheck> {
  const result = await loadConfigWithErrors();

  if (!result.filePath) {
    console.error(chalk.red('❌ No configuration file found'));
    console.error(chalk.gray(`   Create ${CONFIG_FILE_NAME} in your project root`));
    return { ok: false };
  }

  if (!result.config) {
    displayConfigErrors({ fileName: basename(result.filePath), errors: result.errors ?? [] });
    return { ok: false };
  }

  return { ok: true, configPath: result.filePath, config: result.config };
}

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Show or validate promptdeck configuration')
    .option('--validate', 'Validate configuration only (exit 0 if valid, 1 if invalid)')
    .action(async (options: { validate?: boolean }) => {
      let check: ConfigCheck;
      try {
        check = await loadAndValidateConfig();
      } catch (error) {
        reportCommandError('Failed to load configuration', error);
        process.exit(1);
      }

      if (!check.ok) {
        process.exit(1);
      }

      if (options.validate) {
        console.log(chalk.green('✅ Configuration is valid'));
        return;
      }

      console.log(chalk.gray(`# ${check.configPath} (defaults applied)`));
      console.log(yamlStringify(check.config).trimEnd());
    });
}
