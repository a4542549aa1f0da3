import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@promptdeck/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { PromptCollection } from '../src/collection.js';
import { PromptError } from '../src/errors.js';
import {
  generatePromptFactorySource,
  toPascalCase,
  writePromptFactoryModule,
} from '../src/factory-codegen.js';

describe('toPascalCase', () => {
  it('should convert snake and kebab case', () => {
    expect(toPascalCase('system_prompt')).toBe('SystemPrompt');
    expect(toPascalCase('onboarding-intro')).toBe('OnboardingIntro');
  });

  it('should keep inner capitals', () => {
    expect(toPascalCase('reviewRequest')).toBe('ReviewRequest');
  });
});

describe('generatePromptFactorySource', () => {
  it('should generate one typed method per template and list', () => {
    const collection = new PromptCollection();
    collection.addTemplate('system_prompt', 'You work on {{projectName}} for {{owner}}.');
    collection.addTemplate('greeting', 'Hello!');
    collection.addList('planning_rules', ['Read first', 'Plan second']);

    expect(generatePromptFactorySource(collection)).toBe(
      [
        '// Generated by `promptdeck prompts generate-factory`. Do not edit by hand.',
        '',
        "import { PromptFactoryBase, type PromptList } from '@promptdeck/prompts';",
        '',
        '/**',
        ' * Typed access to the prompt templates and prompt lists of this collection',
        ' */',
        'export class PromptFactory extends PromptFactoryBase {',
        '  createSystemPrompt(params: { owner: unknown; projectName: unknown }): string {',
        "    return this.renderPrompt('system_prompt', params);",
        '  }',
        '',
        '  createGreeting(): string {',
        "    return this.renderPrompt('greeting');",
        '  }',
        '',
        '  getPlanningRulesList(): PromptList {',
        "    return this.getPromptList('planning_rules');",
        '  }',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should omit the PromptList import when there are no lists', () => {
    const collection = new PromptCollection();
    collection.addTemplate('greeting', 'Hello!');

    const source = generatePromptFactorySource(collection, { importFrom: '../lib/prompts.js' });

    expect(source.split('\n')[2]).toBe("import { PromptFactoryBase } from '../lib/prompts.js';");
  });

  it('should generate an empty class for an empty collection', () => {
    const source = generatePromptFactorySource(new PromptCollection());

    expect(source.split('\n')[7]).toBe('export class PromptFactory extends PromptFactoryBase {}');
  });

  it('should quote parameter names that are not identifiers', () => {
    const collection = new PromptCollection();
    collection.addTemplate('ticket', 'Ticket {{[ticket-id]}}');

    const source = generatePromptFactorySource(collection);

    expect(source).toContain("  createTicket(params: { 'ticket-id': unknown }): string {");
  });

  it('should escape control characters and quotes in prompt names', () => {
    const collection = new PromptCollection();
    collection.addList('a\nb', ['x']);
    collection.addTemplate("it's", 'Hi');

    const lines = generatePromptFactorySource(collection).split('\n');

    expect(lines).toContain(String.raw`    return this.getPromptList('a\nb');`);
    expect(lines).toContain(String.raw`    return this.renderPrompt('it\'s');`);
  });

  it('should reject names that generate the same method', () => {
    const collection = new PromptCollection();
    collection.addTemplate('foo_bar', 'A');
    collection.addTemplate('foo-bar', 'B');

    expect(() => generatePromptFactorySource(collection)).toThrow(PromptError);
    expect(() => generatePromptFactorySource(collection)).toThrow(
      "Prompt names 'foo_bar' and 'foo-bar' both generate method 'createFooBar'"
    );
  });
});

describe('writePromptFactoryModule', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('promptdeck-codegen-');
  });

  afterEach(async () => {
    await removeTempTestDir(testDir);
  });

  it('should write the generated module, creating parent directories', async () => {
    const promptsDir = join(testDir, 'prompts');
    mkdirSync(promptsDir);
    writeFileSync(join(promptsDir, 'default.yml'), 'prompts:\n  greeting: Hello {{name}}\n');
    const target = join(testDir, 'src', 'generated', 'prompt-factory.ts');

    await writePromptFactoryModule(promptsDir, target);

    expect(readFileSync(target, 'utf-8')).toContain(
      '  createGreeting(params: { name: unknown }): string {'
    );
  });
});
