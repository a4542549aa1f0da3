/**
 * Multi-language prompt templates and prompt lists
 */

import { InconsistentParametersError, PromptError } from './errors.js';
import {
  DEFAULT_LANGUAGE,
  MultiLangContainer,
  type AddItemOptions,
  type LanguageFallback,
} from './languages.js';
import type { PromptList } from './prompt-list.js';
import type { PromptParameters, PromptTemplate } from './template.js';

export interface LanguageSelection {
  language?: string;
  fallback?: LanguageFallback;
}

function sameParameters(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, index) => name === b[index]);
}

/**
 * One prompt template in several languages
 *
 * Every language variant must take the same parameters, so callers (and the
 * generated prompt factory) can render any language with one set of values.
 */
export class MultiLangPromptTemplate {
  private readonly templates: MultiLangContainer<PromptTemplate>;

  constructor(name: string) {
    this.templates = new MultiLangContainer<PromptTemplate>(name);
  }

  get name(): string {
    return this.templates.name;
  }

  get size(): number {
    return this.templates.size;
  }

  getLanguages(): string[] {
    return this.templates.getLanguages();
  }

  add(template: PromptTemplate, language: string = DEFAULT_LANGUAGE, options: AddItemOptions = {}): void {
    if (this.size > 0) {
      const expected = this.getParameters();
      const actual = template.getParameters();
      if (!sameParameters(expected, actual)) {
        throw new InconsistentParametersError(this.name, language, expected, actual);
      }
    }
    this.templates.add(template, language, options);
  }

  getTemplate(language: string = DEFAULT_LANGUAGE, fallback: LanguageFallback = 'exception'): PromptTemplate {
    return this.templates.get(language, fallback);
  }

  /**
   * @throws PromptError when no template has been registered yet
   */
  getParameters(): string[] {
    const languages = this.templates.getLanguages();
    if (languages.length === 0) {
      throw new PromptError(
        `No prompt templates registered for '${this.name}'; register a template before reading its parameters`
      );
    }
    return this.templates.get(languages[0]).getParameters();
  }

  render(params: PromptParameters = {}, selection: LanguageSelection = {}): string {
    return this.getTemplate(selection.language, selection.fallback).render(params);
  }
}

export class MultiLangPromptList extends MultiLangContainer<PromptList> {}
