import { loadPromptCollection, type PromptCollection } from './collection.js';
import { DEFAULT_LANGUAGE, type LanguageFallback } from './languages.js';
import type { PromptList } from './prompt-list.js';
import type { PromptParameters } from './template.js';

export interface PromptFactoryOptions {
  /** Language for every lookup (default: "default") */
  language?: string;
  /** Fallback when a prompt is missing in that language (default: exception) */
  fallback?: LanguageFallback;
}

export type PromptFactoryConstructor<T extends PromptFactoryBase> = new (
  collection: PromptCollection,
  language?: string,
) => T;

/**
 * Base class for generated prompt factories
 *
 * A generated subclass has one typed method per template and per list, all
 * bound to a single language.
 */
export class PromptFactoryBase {
  constructor(
    protected readonly collection: PromptCollection,
    public readonly language: string = DEFAULT_LANGUAGE,
  ) {}

  /**
   * Load the collection in `dir` and construct the factory
   *
   * @example
   * const prompts = await PromptFactory.load('prompts', { language: 'de', fallback: 'default' });
   * prompts.createSystemPrompt({ projectName: 'demo' });
   */
  static async load<T extends PromptFactoryBase>(
    this: PromptFactoryConstructor<T>,
    dir: string,
    options: PromptFactoryOptions = {},
  ): Promise<T> {
    const collection = await loadPromptCollection(dir, { fallback: options.fallback });
    return new this(collection, options.language ?? DEFAULT_LANGUAGE);
  }

  protected renderPrompt(name: string, params: PromptParameters = {}): string {
    return this.collection.render(name, params, this.language);
  }

  protected getPromptList(name: string): PromptList {
    return this.collection.getList(name, this.language);
  }
}
