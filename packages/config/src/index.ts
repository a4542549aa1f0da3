/**
 * @promptdeck/config
 *
 * Configuration system for promptdeck with YAML-first design
 * and Zod schema validation.
 *
 * @example Basic YAML configuration
 * ```yaml
 * # promptdeck.config.yaml
 * prompts:
 *   dir: prompts
 * modes:
 *   active: [planning]
 * publish:
 *   tokenEnv: NPM_TOKEN
 *   packages: [packages/core, packages/cli]
 * ```
 */

// Core schema types and validation
export {
  type LanguageFallbackSetting,
  type PromptsConfig,
  type ModesConfig,
  type ToolsConfig,
  type PublishConfig,
  type ProjectConfig,
  type ProjectConfigInput,
  LanguageFallbackSchema,
  PromptsConfigSchema,
  ModesConfigSchema,
  ToolsConfigSchema,
  PublishConfigSchema,
  ProjectConfigSchema,
  validateConfig,
  safeValidateConfig,
} from './schema.js';

export { createSafeValidator, createStrictValidator, formatZodIssues } from './schema-utils.js';

// Config loading
export {
  readRawConfig,
  loadConfigFromFile,
  findConfigUp,
  findAndLoadConfig,
} from './loader.js';

export {
  CONFIG_FILE_NAME,
  DEFAULT_LANGUAGE,
  LANGUAGE_FALLBACKS,
  PROMPTS_DEFAULTS,
  PUBLISH_DEFAULTS,
} from './constants.js';
