/**
 * Configuration Schema with Zod Validation
 *
 * Runtime validation and type safety for promptdeck.config.yaml.
 */

import { z } from 'zod';

import { LANGUAGE_FALLBACKS, PROMPTS_DEFAULTS, PUBLISH_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

export const LanguageFallbackSchema = z.enum(LANGUAGE_FALLBACKS);

export type LanguageFallbackSetting = z.infer<typeof LanguageFallbackSchema>;

/**
 * Prompts Config Schema
 */
export const PromptsConfigSchema = z.object({
  /** Prompt collection directory, relative to the config file (default: prompts) */
  dir: z.string().min(1, 'Prompts directory cannot be empty').default(PROMPTS_DEFAULTS.DIR),

  /** Language code used for lookups (default: "default") */
  language: z.string().min(1, 'Language cannot be empty').default(PROMPTS_DEFAULTS.LANGUAGE),

  /** What to do when a prompt has no entry for the language (default: exception) */
  fallback: LanguageFallbackSchema.default(PROMPTS_DEFAULTS.FALLBACK),
}).strict();

export type PromptsConfig = z.infer<typeof PromptsConfigSchema>;

/**
 * Modes Config Schema
 */
export const ModesConfigSchema = z.object({
  /** Extra mode directories, relative to the config file (default: []) */
  dirs: z.array(z.string().min(1)).default([]),

  /** Modes active when none are requested explicitly (default: []) */
  active: z.array(z.string().min(1)).default([]),

  /** Register the built-in modes shipped with promptdeck (default: true) */
  includeBuiltins: z.boolean().default(true),
}).strict();

export type ModesConfig = z.infer<typeof ModesConfigSchema>;

/**
 * Tools Config Schema
 *
 * The tool catalog the agent exposes. Used to compute the effective tool set
 * of the active modes and to flag exclusions that name no known tool.
 */
export const ToolsConfigSchema = z.object({
  /** Tools enabled unless a mode excludes them */
  available: z.array(z.string().min(1)).default([]),

  /** Tools disabled unless a mode includes them */
  optional: z.array(z.string().min(1)).default([]),
}).strict();

export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

/**
 * Publish Config Schema
 */
export const PublishConfigSchema = z.object({
  /** Environment variable holding the upload token (default: NPM_TOKEN) */
  tokenEnv: z
    .string()
    .regex(/^[A-Za-z_]\w*$/, 'tokenEnv must be a valid environment variable name')
    .default(PUBLISH_DEFAULTS.TOKEN_ENV),

  /** Optional: Registry URL passed to npm publish */
  registry: z.string().url('registry must be a URL').optional(),

  /** npm script run in the project root before upload (default: build) */
  buildScript: z.string().min(1, 'buildScript cannot be empty').default(PUBLISH_DEFAULTS.BUILD_SCRIPT),

  /** Package access level (default: public) */
  access: z.enum(['public', 'restricted']).default(PUBLISH_DEFAULTS.ACCESS),

  /** Add --provenance when running in GitHub Actions (default: false) */
  provenance: z.boolean().default(PUBLISH_DEFAULTS.PROVENANCE),

  /** Package directories relative to the config file, in publish order (default: ['.']) */
  packages: z.array(z.string().min(1)).min(1, 'At least one package directory required').default(['.']),
}).strict();

export type PublishConfig = z.infer<typeof PublishConfigSchema>;

/**
 * Full Configuration Schema
 *
 * Root configuration object for promptdeck. Every section is optional.
 */
export const ProjectConfigSchema = z.object({
  prompts: PromptsConfigSchema.default({}),
  modes: ModesConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  publish: PublishConfigSchema.default({}),
}).strict();

/** Configuration after defaults are applied */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Configuration as written in the YAML file */
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

/**
 * Validate configuration object
 *
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(ProjectConfigSchema);

/**
 * Safe validation function for ProjectConfig
 */
export const safeValidateConfig = createSafeValidator(ProjectConfigSchema);
