import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@promptdeck/utils';
import type { Command } from 'commander';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { modesCommand } from '../../src/commands/modes.js';
import { executeCommand, setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';

const PROJECT_CONFIG = `modes:
  dirs: [modes]
  active: [review]
tools:
  available: [read_file, create_text_file, execute_shell_command]
  optional: [web_search]
`;

const REVIEW_MODE = `description: Review only
prompt: Review the change and list the problems you find.
excludedTools: [create_text_file, delete_everything]
includedOptionalTools: [web_search]
`;

function bullets(lines: string[]): string[] {
  return lines.filter(line => line.startsWith('  • '));
}

describe('modes command', () => {
  let env: CommanderTestEnv;
  let program: Command;
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('promptdeck-modes-cmd-');
    writeFileSync(join(testDir, 'promptdeck.config.yaml'), PROJECT_CONFIG);
    mkdirSync(join(testDir, 'modes'));
    writeFileSync(join(testDir, 'modes', 'review.yml'), REVIEW_MODE);

    env = setupCommanderTest();
    program = env.program;
    modesCommand(program);
    vi.spyOn(process, 'cwd').mockReturnValue(testDir);
  });

  afterEach(async () => {
    env.cleanup();
    await removeTempTestDir(testDir);
  });

  describe('list', () => {
    it('should list built-in and project modes by name', async () => {
      const exitCode = await executeCommand(program, ['modes', 'list']);

      expect(exitCode).toBe(0);
      expect(env.capturedLog.filter(line => line.startsWith('  '))).toEqual([
        '  All tools, for implementing changes',
        '  Only read-only tools, focused on analysis and planning',
        '  Review only',
      ]);
    });
  });

  describe('show', () => {
    it('should print the prompt and tool lists of a mode', async () => {
      const exitCode = await executeCommand(program, ['modes', 'show', 'review']);

      expect(exitCode).toBe(0);
      expect(env.capturedLog).toContain('Review the change and list the problems you find.');
      expect(bullets(env.capturedLog)).toEqual(['  • create_text_file', '  • delete_everything', '  • web_search']);
    });

    it('should exit 1 for an unknown mode', async () => {
      const exitCode = await executeCommand(program, ['modes', 'show', 'nope']);

      expect(exitCode).toBe(1);
      expect(env.capturedError.join('\n')).toContain("Unknown mode 'nope' (available: editing, planning, review)");
    });
  });

  describe('tools', () => {
    it('should apply the configured active modes', async () => {
      const exitCode = await executeCommand(program, ['modes', 'tools']);

      expect(exitCode).toBe(0);
      expect(bullets(env.capturedLog)).toEqual([
        // allowed
        '  • read_file',
        '  • execute_shell_command',
        '  • web_search',
        // excluded
        '  • create_text_file',
        '  • delete_everything',
      ]);
      expect(env.capturedError.join('\n')).toContain(
        "⚠️  Excluded tool 'delete_everything' is not in the tool catalog"
      );
    });

    it('should activate the modes given with --mode', async () => {
      const exitCode = await executeCommand(program, ['modes', 'tools', '--mode', 'planning', 'editing']);

      expect(exitCode).toBe(0);
      expect(bullets(env.capturedLog)).toEqual([
        '  • read_file',
        '  • create_text_file',
        '  • delete_lines',
        '  • execute_shell_command',
        '  • insert_after_symbol',
        '  • insert_at_line',
        '  • insert_before_symbol',
        '  • replace_lines',
        '  • replace_symbol_body',
      ]);
    });

    it('should exit 1 when a mode file is invalid', async () => {
      writeFileSync(join(testDir, 'modes', 'broken.yml'), 'prompt: ""\n');

      const exitCode = await executeCommand(program, ['modes', 'tools']);

      expect(exitCode).toBe(1);
      expect(env.capturedError.join('\n')).toContain('prompt: prompt cannot be empty');
    });
  });
});
