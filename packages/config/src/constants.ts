/**
 * Configuration Constants
 *
 * Single source of truth for default values shared by the schema and the
 * commands that fall back to them when no config file exists.
 *
 * @packageDocumentation
 */

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'promptdeck.config.yaml';

/**
 * Language code used for single-language prompt collections
 */
export const DEFAULT_LANGUAGE = 'default';

/**
 * Behaviour when a prompt is missing for the requested language
 */
export const LANGUAGE_FALLBACKS = ['any', 'exception', 'default'] as const;

/**
 * Default publish configuration values
 *
 * @example
 * ```typescript
 * import { PUBLISH_DEFAULTS } from '@promptdeck/config';
 *
 * const tokenEnv = config.publish.tokenEnv ?? PUBLISH_DEFAULTS.TOKEN_ENV;
 * ```
 */
export const PUBLISH_DEFAULTS = {
  /** Environment variable holding the registry upload token */
  TOKEN_ENV: 'NPM_TOKEN' as const,

  /** npm script that builds the packages before upload */
  BUILD_SCRIPT: 'build' as const,

  ACCESS: 'public' as const,

  PROVENANCE: false as const,
} as const;

export const PROMPTS_DEFAULTS = {
  DIR: 'prompts' as const,
  LANGUAGE: DEFAULT_LANGUAGE,
  FALLBACK: 'exception' as const,
} as const;
