/**
 * Prompt Factory Generator
 *
 * Writes a TypeScript module with a `PromptFactory` class for a prompt
 * collection: one `create<Name>()` method per template, typed with the
 * template's parameters, and one `get<Name>List()` method per prompt list.
 * Renaming a template parameter then breaks the build instead of a render.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { logDebug } from '@promptdeck/utils';

import { loadPromptCollection, type PromptCollection } from './collection.js';
import { PromptError } from './errors.js';

export const DEFAULT_FACTORY_IMPORT = '@promptdeck/prompts';

export interface GenerateFactoryOptions {
  /** Module the generated file imports PromptFactoryBase from (default: @promptdeck/prompts) */
  importFrom?: string;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*$/;

/**
 * Single-quoted TypeScript string literal
 *
 * JSON escaping covers backslashes and control characters such as newlines.
 */
function quote(value: string): string {
  const escaped = JSON.stringify(value)
    .slice(1, -1)
    .replaceAll(String.raw`\"`, '"')
    .replaceAll("'", String.raw`\'`);
  return `'${escaped}'`;
}

/**
 * Convert a prompt name to PascalCase
 *
 * @example
 * toPascalCase('system_prompt'); // 'SystemPrompt'
 * toPascalCase('onboarding-intro'); // 'OnboardingIntro'
 */
export function toPascalCase(name: string): string {
  return name
    .split(/[^A-Za-z0-9]+/)
    .filter(segment => segment.length > 0)
    .map(segment => segment[0].toUpperCase() + segment.slice(1))
    .join('');
}

function methodName(prefix: string, name: string, suffix: string): string {
  const pascal = toPascalCase(name);
  if (pascal.length === 0) {
    throw new PromptError(`Cannot derive a method name from prompt name ${quote(name)}`);
  }
  return `${prefix}${pascal}${suffix}`;
}

function paramsType(parameters: string[]): string {
  const fields = parameters.map(param => {
    const key = IDENTIFIER_PATTERN.test(param) ? param : quote(param);
    return `${key}: unknown`;
  });
  return `{ ${fields.join('; ')} }`;
}

function templateMethod(method: string, name: string, parameters: string[]): string[] {
  if (parameters.length === 0) {
    return [
      `  ${method}(): string {`,
      `    return this.renderPrompt(${quote(name)});`,
      '  }',
    ];
  }
  return [
    `  ${method}(params: ${paramsType(parameters)}): string {`,
    `    return this.renderPrompt(${quote(name)}, params);`,
    '  }',
  ];
}

function listMethod(method: string, name: string): string[] {
  return [
    `  ${method}(): PromptList {`,
    `    return this.getPromptList(${quote(name)});`,
    '  }',
  ];
}

/**
 * Generate the source of a PromptFactory module
 *
 * @throws PromptError if two prompt names map to the same method name
 */
export function generatePromptFactorySource(
  collection: PromptCollection,
  options: GenerateFactoryOptions = {},
): string {
  const importFrom = options.importFrom ?? DEFAULT_FACTORY_IMPORT;
  const methods: string[][] = [];
  const usedNames = new Map<string, string>();

  const claim = (method: string, promptName: string): void => {
    const existing = usedNames.get(method);
    if (existing !== undefined) {
      throw new PromptError(
        `Prompt names ${quote(existing)} and ${quote(promptName)} both generate method '${method}'`
      );
    }
    usedNames.set(method, promptName);
  };

  for (const name of collection.getTemplateNames()) {
    const method = methodName('create', name, '');
    claim(method, name);
    methods.push(templateMethod(method, name, collection.getTemplateParameters(name)));
  }

  const listNames = collection.getListNames();
  for (const name of listNames) {
    const method = methodName('get', name, 'List');
    claim(method, name);
    methods.push(listMethod(method, name));
  }

  const imports = listNames.length > 0
    ? `import { PromptFactoryBase, type PromptList } from ${quote(importFrom)};`
    : `import { PromptFactoryBase } from ${quote(importFrom)};`;

  const body = methods.map(lines => lines.join('\n')).join('\n\n');
  const classDeclaration = methods.length > 0
    ? `export class PromptFactory extends PromptFactoryBase {\n${body}\n}`
    : 'export class PromptFactory extends PromptFactoryBase {}';

  return [
    '// Generated by `promptdeck prompts generate-factory`. Do not edit by hand.',
    '',
    imports,
    '',
    '/**',
    ' * Typed access to the prompt templates and prompt lists of this collection',
    ' */',
    classDeclaration,
    '',
  ].join('\n');
}

/**
 * Generate the factory for a prompt directory and write it to targetPath
 *
 * The target file is overwritten; parent directories are created.
 */
export async function writePromptFactoryModule(
  promptsDir: string,
  targetPath: string,
  options: GenerateFactoryOptions = {},
): Promise<void> {
  const collection = await loadPromptCollection(promptsDir);
  const source = generatePromptFactorySource(collection, options);

  await mkdir(dirname(targetPath), { recursive: true });
  await writeFile(targetPath, source, 'utf-8');
  logDebug('prompts', `Prompt factory written to ${targetPath}`, {
    templates: collection.getTemplateNames().length,
    lists: collection.getListNames().length,
  });
}
