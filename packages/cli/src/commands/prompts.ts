/**
 * Prompts Command
 *
 * List and render the project's prompt collection, and generate its typed
 * prompt factory.
 */

import { resolve } from 'node:path';

import {
  DEFAULT_FACTORY_IMPORT,
  loadPromptCollection,
  writePromptFactoryModule,
  type PromptCollection,
  type PromptParameters,
} from '@promptdeck/prompts';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadProjectConfig, type LoadedProjectConfig } from '../utils/config-loader.js';
import { reportCommandError } from '../utils/report-error.js';

function promptsDir(loaded: LoadedProjectConfig): string {
  return resolve(loaded.rootDir, loaded.config.prompts.dir);
}

async function loadCollection(loaded: LoadedProjectConfig): Promise<PromptCollection> {
  return loadPromptCollection(promptsDir(loaded), { fallback: loaded.config.prompts.fallback });
}

/**
 * Parse `key=value` pairs into render parameters
 *
 * Only the first `=` separates; values may contain more.
 *
 * @example
 * parseParams(['projectName=demo', 'query=a=b']); // { projectName: 'demo', query: 'a=b' }
 */
export function parseParams(pairs: readonly string[]): PromptParameters {
  const params: PromptParameters = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid parameter '${pair}': expected key=value`);
    }
    params[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return params;
}

async function listPrompts(): Promise<void> {
  const collection = await loadCollection(await loadProjectConfig());

  console.log(chalk.blue('Templates:'));
  const templateNames = collection.getTemplateNames();
  if (templateNames.length === 0) {
    console.log(chalk.gray('  (none)'));
  }
  for (const name of templateNames) {
    const template = collection.getMultiLangTemplate(name);
    const params = template.getParameters();
    console.log(
      `  • ${chalk.bold(name)}(${params.join(', ')}) ${chalk.gray(`[${template.getLanguages().join(', ')}]`)}`
    );
  }

  console.log(chalk.blue('Lists:'));
  const listNames = collection.getListNames();
  if (listNames.length === 0) {
    console.log(chalk.gray('  (none)'));
  }
  for (const name of listNames) {
    console.log(`  • ${chalk.bold(name)} ${chalk.gray(`[${collection.getMultiLangList(name).getLanguages().join(', ')}]`)}`);
  }
}

async function renderPrompt(name: string, options: { lang?: string; param?: string[] }): Promise<void> {
  const loaded = await loadProjectConfig();
  const collection = await loadCollection(loaded);
  const language = options.lang ?? loaded.config.prompts.language;

  console.log(collection.render(name, parseParams(options.param ?? []), language));
}

async function generateFactory(options: { out: string; importFrom?: string }): Promise<void> {
  const loaded = await loadProjectConfig();
  const targetPath = resolve(options.out);

  await writePromptFactoryModule(promptsDir(loaded), targetPath, {
    importFrom: options.importFrom ?? DEFAULT_FACTORY_IMPORT,
  });

  console.log(chalk.green('✅ Generated prompt factory:'));
  console.log(`   ${targetPath}`);
}

export function promptsCommand(program: Command): void {
  const prompts = program
    .command('prompts')
    .description('Work with the prompt collection');

  prompts
    .command('list')
    .description('List prompt templates (with parameters and languages) and prompt lists')
    .action(async () => {
      try {
        await listPrompts();
      } catch (error) {
        reportCommandError('Failed to list prompts', error);
        process.exit(1);
      }
    });

  prompts
    .command('render')
    .description('Render a prompt template to stdout')
    .argument('<name>', 'Template name')
    .option('--lang <code>', 'Language (default: prompts.language from config)')
    .option('-p, --param <key=value...>', 'Template parameter')
    .action(async (name: string, options: { lang?: string; param?: string[] }) => {
      try {
        await renderPrompt(name, options);
      } catch (error) {
        reportCommandError(`Failed to render prompt '${name}'`, error);
        process.exit(1);
      }
    });

  prompts
    .command('generate-factory')
    .description('Generate a TypeScript PromptFactory class for the prompt collection')
    .requiredOption('--out <file>', 'Output file')
    .option('--import-from <module>', `Module to import PromptFactoryBase from (default: ${DEFAULT_FACTORY_IMPORT})`)
    .action(async (options: { out: string; importFrom?: string }) => {
      try {
        await generateFactory(options);
      } catch (error) {
        reportCommandError('Failed to generate prompt factory', error);
        process.exit(1);
      }
    });
}
