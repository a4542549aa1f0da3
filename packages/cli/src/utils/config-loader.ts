/**
 * Configuration Loader
 *
 * Finds promptdeck.config.yaml by walking up from the working directory and
 * loads it with per-field validation errors.
 */

import { join } from 'node:path';

import {
  CONFIG_FILE_NAME,
  findConfigUp,
  readRawConfig,
  safeValidateConfig,
  validateConfig,
  type ProjectConfig,
} from '@promptdeck/config';
import { logDebug } from '@promptdeck/utils';

/**
 * Config file that is missing required structure or cannot be parsed
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errors: string[];

  constructor(filePath: string, errors: string[]) {
    super(`Configuration is invalid: ${filePath}`);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errors = errors;
  }
}

export interface LoadedProjectConfig {
  config: ProjectConfig;
  /** Directory of the config file, or the working directory when there is none */
  rootDir: string;
  configPath: string | null;
}

/**
 * Find config file path if it exists (searches up directory tree)
 *
 * @returns Config file path or null if not found
 */
export function findConfigPath(cwd: string = process.cwd()): string | null {
  const configDir = findConfigUp(cwd);
  return configDir ? join(configDir, CONFIG_FILE_NAME) : null;
}

/**
 * Load configuration with detailed validation errors
 *
 * @returns The config, or the errors that prevented loading it, plus the file path
 */
export async function loadConfigWithErrors(cwd: string = process.cwd()): Promise<{
  config: ProjectConfig | null;
  errors: string[] | null;
  filePath: string | null;
}> {
  const configPath = findConfigPath(cwd);
  if (!configPath) {
    return { config: null, errors: null, filePath: null };
  }

  let raw: Record<string, unknown>;
  try {
    raw = readRawConfig(configPath);
  } catch (error) {
    return {
      config: null,
      errors: [error instanceof Error ? error.message : String(error)],
      filePath: configPath,
    };
  }

  const validation = safeValidateConfig(raw);
  if (!validation.success) {
    return { config: null, errors: validation.errors, filePath: configPath };
  }

  return { config: validation.data, errors: null, filePath: configPath };
}

/**
 * Load the project configuration, falling back to defaults without a file
 *
 * @throws ConfigLoadError if a config file exists but is invalid
 */
export async function loadProjectConfig(cwd: string = process.cwd()): Promise<LoadedProjectConfig> {
  const result = await loadConfigWithErrors(cwd);

  if (result.filePath === null) {
    logDebug('config', `No ${CONFIG_FILE_NAME} found from ${cwd}, using defaults`);
    return { config: validateConfig({}), rootDir: cwd, configPath: null };
  }

  if (!result.config) {
    throw new ConfigLoadError(result.filePath, result.errors ?? []);
  }

  const rootDir = findConfigUp(cwd) ?? cwd;
  return { config: result.config, rootDir, configPath: result.filePath };
}
