/**
 * Modes Command
 *
 * Inspect agent modes and the tool set they leave the agent.
 */

import { resolve } from 'node:path';

import { createModeRegistry, createToolPolicy, type ModeRegistry } from '@promptdeck/modes';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadProjectConfig, type LoadedProjectConfig } from '../utils/config-loader.js';
import { reportCommandError } from '../utils/report-error.js';

async function loadRegistry(loaded: LoadedProjectConfig): Promise<ModeRegistry> {
  const { config, rootDir } = loaded;
  return createModeRegistry({
    includeBuiltins: config.modes.includeBuiltins,
    dirs: config.modes.dirs.map(dir => resolve(rootDir, dir)),
  });
}

function printToolList(title: string, tools: string[]): void {
  console.log(chalk.blue(`${title}:`));
  if (tools.length === 0) {
    console.log(chalk.gray('  (none)'));
    return;
  }
  for (const tool of tools) {
    console.log(`  • ${tool}`);
  }
}

async function listModes(): Promise<void> {
  const registry = await loadRegistry(await loadProjectConfig());
  const modes = registry.list();

  if (modes.length === 0) {
    console.log(chalk.gray('No modes registered'));
    return;
  }

  for (const mode of modes) {
    console.log(`${chalk.bold(mode.name)} ${chalk.gray(`(${mode.origin})`)}`);
    if (mode.description) {
      console.log(`  ${mode.description}`);
    }
  }
}

async function showMode(name: string): Promise<void> {
  const registry = await loadRegistry(await loadProjectConfig());
  const mode = registry.get(name);

  console.log(`${chalk.bold(mode.name)} ${chalk.gray(`(${mode.origin})`)}`);
  if (mode.description) {
    console.log(mode.description);
  }
  console.log();
  console.log(chalk.blue('Prompt:'));
  console.log(mode.prompt);
  console.log();
  printToolList('Excluded tools', mode.excludedTools);
  printToolList('Included optional tools', mode.includedOptionalTools);
}

async function showTools(modeNames: string[] | undefined): Promise<void> {
  const loaded = await loadProjectConfig();
  const registry = await loadRegistry(loaded);
  const active = registry.resolve(modeNames ?? loaded.config.modes.active);
  const policy = createToolPolicy(active, loaded.config.tools);

  console.log(`${chalk.blue('Active modes:')} ${active.names.length > 0 ? active.names.join(', ') : '(none)'}`);
  printToolList('Allowed tools', policy.allowed);
  printToolList('Excluded tools', policy.excluded);

  for (const tool of policy.unknownExclusions) {
    console.error(chalk.yellow(`⚠️  Excluded tool '${tool}' is not in the tool catalog`));
  }
}

export function modesCommand(program: Command): void {
  const modes = program
    .command('modes')
    .description('Inspect agent modes and their tool policy');

  modes
    .command('list')
    .description('List built-in and project modes')
    .action(async () => {
      try {
        await listModes();
      } catch (error) {
        reportCommandError('Failed to list modes', error);
        process.exit(1);
      }
    });

  modes
    .command('show')
    .description('Show the prompt and tool lists of a mode')
    .argument('<name>', 'Mode name')
    .action(async (name: string) => {
      try {
        await showMode(name);
      } catch (error) {
        reportCommandError(`Failed to show mode '${name}'`, error);
        process.exit(1);
      }
    });

  modes
    .command('tools')
    .description('Show the tools the agent may use with the given modes active')
    .option('-m, --mode <name...>', 'Modes to activate (default: modes.active from config)')
    .action(async (options: { mode?: string[] }) => {
      try {
        await showTools(options.mode);
      } catch (error) {
        reportCommandError('Failed to resolve tools', error);
        process.exit(1);
      }
    });
}
