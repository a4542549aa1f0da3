/**
 * Publish Command
 *
 * Builds and uploads the configured packages. Exits 1 before running anything
 * when the upload token is missing.
 */

import chalk from 'chalk';
import type { Command } from 'commander';

import { MissingCredentialError, publishPackages, type PublishResult } from '../services/publisher.js';
import { loadProjectConfig } from '../utils/config-loader.js';
import { reportCommandError } from '../utils/report-error.js';

interface PublishCommandOptions {
  dryRun?: boolean;
  skipBuild?: boolean;
  tag?: string;
}

function printSummary(result: PublishResult): void {
  const verb = result.dryRun ? 'Dry run finished for' : 'Published';
  console.log(chalk.green(`✅ ${verb} ${result.published.length} package(s) at v${result.version}`));
  console.log(chalk.gray(`   dist-tag: ${result.tag}`));
  for (const name of result.published) {
    console.log(`   • ${name}`);
  }
  if (result.skipped.length > 0) {
    console.log(chalk.gray(`   Skipped private: ${result.skipped.join(', ')}`));
  }
}

export function publishCommand(program: Command): void {
  program
    .command('publish')
    .description('Build and publish packages to the npm registry (requires the upload token)')
    .option('--dry-run', 'Run npm publish with --dry-run')
    .option('--skip-build', 'Do not run the build script first')
    .option('--tag <tag>', 'npm dist-tag (default: derived from the version)')
    .action(async (options: PublishCommandOptions) => {
      try {
        const { config, rootDir } = await loadProjectConfig();
        const result = await publishPackages({
          rootDir,
          config: config.publish,
          dryRun: options.dryRun,
          skipBuild: options.skipBuild,
          tag: options.tag,
        });
        printSummary(result);
      } catch (error) {
        if (error instanceof MissingCredentialError) {
          console.error(chalk.red(error.message));
        } else {
          reportCommandError('Publish failed', error);
        }
        process.exit(1);
      }
    });
}
