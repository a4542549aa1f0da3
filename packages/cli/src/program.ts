import { Command } from 'commander';

import { configCommand } from './commands/config.js';
import { generateWorkflowCommand } from './commands/generate-workflow.js';
import { modesCommand } from './commands/modes.js';
import { promptsCommand } from './commands/prompts.js';
import { publishCommand } from './commands/publish.js';

/**
 * Register every promptdeck command on a program
 *
 * Tests pass a program with exitOverride() already applied, so the setting
 * reaches every subcommand.
 */
export function registerCommands(program: Command): Command {
  configCommand(program);              // promptdeck config
  modesCommand(program);               // promptdeck modes list|show|tools
  promptsCommand(program);             // promptdeck prompts list|render|generate-factory
  publishCommand(program);             // promptdeck publish
  generateWorkflowCommand(program);    // promptdeck generate-workflow
  return program;
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('promptdeck')
    .description('Prompt templates, agent modes, and credential-guarded publishing')
    .version(version);

  return registerCommands(program);
}
