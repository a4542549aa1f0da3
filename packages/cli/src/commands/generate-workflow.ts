/**
 * GitHub Actions Workflow Generator Command
 *
 * Writes the manual-dispatch publish workflow, or checks that the committed
 * file matches the current publish configuration.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { logDebug } from '@promptdeck/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import {
  DEFAULT_WORKFLOW_PATH,
  checkWorkflowSync,
  generatePublishWorkflow,
} from '../services/workflow.js';
import { loadProjectConfig } from '../utils/config-loader.js';
import { reportCommandError } from '../utils/report-error.js';

interface GenerateWorkflowCommandOptions {
  output?: string;
  check?: boolean;
}

/**
 * @returns false when --check found the file missing or out of date
 */
async function runGenerateWorkflow(options: GenerateWorkflowCommandOptions): Promise<boolean> {
  const { config, rootDir } = await loadProjectConfig();
  const workflowPath = resolve(rootDir, options.output ?? DEFAULT_WORKFLOW_PATH);
  const workflow = generatePublishWorkflow({
    tokenEnv: config.publish.tokenEnv,
    registryUrl: config.publish.registry,
    provenance: config.publish.provenance,
  });

  if (options.check) {
    const { inSync, diff } = checkWorkflowSync(workflowPath, workflow);
    logDebug('workflow', `Checked ${workflowPath}`, { inSync });
    if (inSync) {
      console.log(chalk.green('✅ Workflow file is in sync with the publish configuration'));
      return true;
    }
    console.log(chalk.red('❌ Workflow file is out of sync with the publish configuration'));
    console.log(`   ${diff ?? workflowPath}`);
    console.log('Run this to regenerate:');
    console.log('  npx promptdeck generate-workflow');
    return false;
  }

  mkdirSync(dirname(workflowPath), { recursive: true });
  writeFileSync(workflowPath, workflow);

  console.log(chalk.green('✅ Generated workflow file:'));
  console.log(`   ${workflowPath}`);
  return true;
}

export function generateWorkflowCommand(program: Command): void {
  program
    .command('generate-workflow')
    .description('Generate the manual-dispatch GitHub Actions publish workflow')
    .option('--output <path>', `Workflow file, relative to the project root (default: ${DEFAULT_WORKFLOW_PATH})`)
    .option('--check', 'Check that the workflow file is up to date (exit 0 if in sync, 1 if not)')
    .action(async (options: GenerateWorkflowCommandOptions) => {
      let ok: boolean;
      try {
        ok = await runGenerateWorkflow(options);
      } catch (error) {
        reportCommandError('Failed to generate workflow', error);
        process.exit(1);
      }
      if (!ok) {
        process.exit(1);
      }
    });
}
