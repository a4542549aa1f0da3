/**
 * Prompt Collections
 *
 * A collection is one directory of YAML files, typically one file per
 * language:
 *
 * ```yaml
 * lang: de            # optional, defaults to "default"
 * prompts:
 *   system_prompt: |
 *     Du arbeitest an {{projectName}}.
 *   planning_rules:
 *     - Lies nur den nötigen Code.
 *     - Plane vor dem Schreiben.
 * ```
 *
 * String values are templates and lists are prompt lists. Template parameters
 * must match across languages, and a name may appear only once per language.
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { createSafeValidator } from '@promptdeck/config';
import { logDebug } from '@promptdeck/utils';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { PromptFileError, PromptNotFoundError } from './errors.js';
import { DEFAULT_LANGUAGE, type LanguageFallback } from './languages.js';
import { MultiLangPromptList, MultiLangPromptTemplate } from './multi-lang.js';
import { PromptList } from './prompt-list.js';
import { PromptTemplate, type PromptParameters } from './template.js';

const PROMPT_FILE_EXTENSIONS = new Set(['.yml', '.yaml']);

export const PromptFileSchema = z.object({
  /** Language of every prompt in the file */
  lang: z.string().min(1, 'lang cannot be empty').optional(),

  prompts: z.record(
    z.string(),
    z.union([z.string(), z.array(z.string())], {
      errorMap: () => ({ message: 'Prompt must be a template string or a list of strings' }),
    }),
  ),
}).strict();

export type PromptFile = z.infer<typeof PromptFileSchema>;

const safeValidatePromptFile = createSafeValidator(PromptFileSchema);

export interface PromptCollectionOptions {
  /** Applied to template and list lookups (default: exception) */
  fallback?: LanguageFallback;
}

export class PromptCollection {
  /** May be changed after loading */
  fallback: LanguageFallback;

  private readonly templates = new Map<string, MultiLangPromptTemplate>();
  private readonly lists = new Map<string, MultiLangPromptList>();

  constructor(options: PromptCollectionOptions = {}) {
    this.fallback = options.fallback ?? 'exception';
  }

  /** Number of prompt templates (lists are not counted) */
  get size(): number {
    return this.templates.size;
  }

  addTemplate(name: string, source: string, language: string = DEFAULT_LANGUAGE): void {
    const template = new PromptTemplate(name, source);
    let multiLang = this.templates.get(name);
    if (!multiLang) {
      multiLang = new MultiLangPromptTemplate(name);
      this.templates.set(name, multiLang);
    }
    multiLang.add(template, language);
  }

  addList(name: string, items: readonly string[], language: string = DEFAULT_LANGUAGE): void {
    let multiLang = this.lists.get(name);
    if (!multiLang) {
      multiLang = new MultiLangPromptList(name);
      this.lists.set(name, multiLang);
    }
    multiLang.add(new PromptList(items), language);
  }

  /**
   * Add every prompt of a parsed prompt file
   *
   * @param source - Label used in error messages (usually the file path)
   */
  addPromptFile(data: unknown, source: string): void {
    const result = safeValidatePromptFile(data);
    if (!result.success) {
      throw new PromptFileError(source, result.errors);
    }

    const language = result.data.lang ?? DEFAULT_LANGUAGE;
    for (const [name, value] of Object.entries(result.data.prompts)) {
      if (typeof value === 'string') {
        this.addTemplate(name, value, language);
      } else {
        this.addList(name, value, language);
      }
    }
  }

  getTemplateNames(): string[] {
    return [...this.templates.keys()];
  }

  getListNames(): string[] {
    return [...this.lists.keys()];
  }

  getMultiLangTemplate(name: string): MultiLangPromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new PromptNotFoundError('template', name, this.getTemplateNames());
    }
    return template;
  }

  getMultiLangList(name: string): MultiLangPromptList {
    const list = this.lists.get(name);
    if (!list) {
      throw new PromptNotFoundError('list', name, this.getListNames());
    }
    return list;
  }

  getTemplate(name: string, language: string = DEFAULT_LANGUAGE): PromptTemplate {
    return this.getMultiLangTemplate(name).getTemplate(language, this.fallback);
  }

  getTemplateParameters(name: string): string[] {
    return this.getMultiLangTemplate(name).getParameters();
  }

  getList(name: string, language: string = DEFAULT_LANGUAGE): PromptList {
    return this.getMultiLangList(name).get(language, this.fallback);
  }

  render(name: string, params: PromptParameters = {}, language: string = DEFAULT_LANGUAGE): string {
    return this.getTemplate(name, language).render(params);
  }
}

/**
 * Load a prompt collection from the YAML files directly inside a directory
 *
 * Files are read in name order, so the first language registered (used by the
 * `any` fallback) is stable across platforms.
 *
 * @throws PromptFileError for a file with the wrong structure
 * @throws PromptError for inconsistent parameters or duplicate names
 */
export async function loadPromptCollection(
  dir: string,
  options: PromptCollectionOptions = {}
): Promise<PromptCollection> {
  const collection = new PromptCollection(options);
  const entries = await readdir(dir, { withFileTypes: true });
  const fileNames = entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b));

  for (const fileName of fileNames) {
    if (!PROMPT_FILE_EXTENSIONS.has(extname(fileName))) {
      logDebug('prompts', `Skipping non-YAML file: ${fileName}`, { dir });
      continue;
    }

    const filePath = join(dir, fileName);
    const content = await readFile(filePath, 'utf-8');
    collection.addPromptFile(parseYaml(content), filePath);
  }

  return collection;
}
