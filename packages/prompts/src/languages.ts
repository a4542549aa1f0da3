/**
 * Multi-language containers
 *
 * Holds items that share one meaning (a prompt, a list of rules) in several
 * languages. Single-language projects register everything under
 * DEFAULT_LANGUAGE.
 */

import { DEFAULT_LANGUAGE, type LanguageFallbackSetting } from '@promptdeck/config';

import { DuplicateLanguageError, LanguageNotFoundError } from './errors.js';

export { DEFAULT_LANGUAGE };

/**
 * What to do when no item is registered for the requested language
 *
 * - `exception`: throw LanguageNotFoundError
 * - `any`: use the first registered item
 * - `default`: use the item registered under DEFAULT_LANGUAGE
 */
export type LanguageFallback = LanguageFallbackSetting;

export interface AddItemOptions {
  /** Replace an existing entry for the same language (default: false) */
  allowOverwrite?: boolean;
}

export class MultiLangContainer<T> {
  private readonly items = new Map<string, T>();

  constructor(public readonly name: string) {}

  get size(): number {
    return this.items.size;
  }

  /** Languages in registration order */
  getLanguages(): string[] {
    return [...this.items.keys()];
  }

  add(item: T, language: string = DEFAULT_LANGUAGE, options: AddItemOptions = {}): void {
    if (!options.allowOverwrite && this.items.has(language)) {
      throw new DuplicateLanguageError(this.name, language);
    }
    this.items.set(language, item);
  }

  get(language: string = DEFAULT_LANGUAGE, fallback: LanguageFallback = 'exception'): T {
    const item = this.items.get(language);
    if (item !== undefined) {
      return item;
    }

    switch (fallback) {
      case 'exception':
        throw new LanguageNotFoundError(`Item for language '${language}' not found for name '${this.name}'`);

      case 'any': {
        const first = this.items.values().next();
        if (first.done) {
          throw new LanguageNotFoundError(`No items registered for any language in '${this.name}'`);
        }
        return first.value;
      }

      case 'default': {
        const defaultItem = this.items.get(DEFAULT_LANGUAGE);
        if (defaultItem === undefined) {
          throw new LanguageNotFoundError(
            `Item not found for language '${language}' nor for the default language in '${this.name}'`
          );
        }
        return defaultItem;
      }
    }
  }
}
