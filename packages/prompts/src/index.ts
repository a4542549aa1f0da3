/**
 * @promptdeck/prompts
 *
 * Prompt templates and prompt lists with multi-language support, loaded from
 * one directory of YAML files per collection.
 *
 * @example
 * ```typescript
 * import { loadPromptCollection } from '@promptdeck/prompts';
 *
 * const prompts = await loadPromptCollection('prompts', { fallback: 'default' });
 * prompts.render('system_prompt', { projectName: 'demo' }, 'de');
 * ```
 */

export {
  PromptError,
  PromptTemplateError,
  MissingParametersError,
  LanguageNotFoundError,
  DuplicateLanguageError,
  InconsistentParametersError,
  PromptNotFoundError,
  PromptFileError,
} from './errors.js';

export {
  DEFAULT_LANGUAGE,
  MultiLangContainer,
  type LanguageFallback,
  type AddItemOptions,
} from './languages.js';

export {
  PromptTemplate,
  collectTemplateParameters,
  type PromptParameters,
} from './template.js';

export { PromptList } from './prompt-list.js';

export {
  MultiLangPromptTemplate,
  MultiLangPromptList,
  type LanguageSelection,
} from './multi-lang.js';

export {
  PromptCollection,
  PromptFileSchema,
  loadPromptCollection,
  type PromptFile,
  type PromptCollectionOptions,
} from './collection.js';

export {
  PromptFactoryBase,
  type PromptFactoryOptions,
  type PromptFactoryConstructor,
} from './factory.js';

export {
  generatePromptFactorySource,
  writePromptFactoryModule,
  toPascalCase,
  DEFAULT_FACTORY_IMPORT,
  type GenerateFactoryOptions,
} from './factory-codegen.js';
