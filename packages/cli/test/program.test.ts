import { describe, it, expect } from 'vitest';

import { createProgram } from '../src/program.js';

describe('createProgram', () => {
  it('should register every top-level command', () => {
    const program = createProgram('1.2.3');

    expect(program.name()).toBe('promptdeck');
    expect(program.version()).toBe('1.2.3');
    expect(program.commands.map(cmd => cmd.name())).toEqual([
      'config',
      'modes',
      'prompts',
      'publish',
      'generate-workflow',
    ]);
  });

  it('should register the subcommands of modes and prompts', () => {
    const program = createProgram('1.2.3');
    const subcommands = (name: string) =>
      program.commands.find(cmd => cmd.name() === name)?.commands.map(cmd => cmd.name());

    expect(subcommands('modes')).toEqual(['list', 'show', 'tools']);
    expect(subcommands('prompts')).toEqual(['list', 'render', 'generate-factory']);
  });
});
