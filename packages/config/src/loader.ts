/**
 * Configuration Loader
 *
 * Loads and resolves promptdeck configuration from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { logDebug, logWarning } from '@promptdeck/utils';
import { parse as parseYaml } from 'yaml';

import { CONFIG_FILE_NAME } from './constants.js';
import { validateConfig, type ProjectConfig } from './schema.js';

/**
 * Parse a config file into a plain object without validating it
 *
 * Used both by loadConfigFromFile and by callers that want per-field errors
 * via safeValidateConfig instead of a thrown ZodError.
 *
 * @throws Error if the file is not .yaml, unreadable, not valid YAML, or not a mapping
 */
export function readRawConfig(configPath: string): Record<string, unknown> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml')) {
    throw new Error(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.\n` +
      `Please use ${CONFIG_FILE_NAME}`
    );
  }

  const content = readFileSync(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content);

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Configuration must be an object');
  }

  // $schema is for IDE support only
  return Object.fromEntries(Object.entries(raw).filter(([key]) => key !== '$schema'));
}

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration
 * @throws Error if file cannot be loaded, ZodError if it is invalid
 */
export async function loadConfigFromFile(configPath: string): Promise<ProjectConfig> {
  return validateConfig(readRawConfig(configPath));
}

/**
 * Find the directory containing promptdeck.config.yaml
 *
 * Walks up from startDir to the filesystem root, the way ESLint and Prettier
 * find their config files.
 *
 * @returns Directory containing the config file, or null if none found
 */
export function findConfigUp(startDir: string): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    if (existsSync(join(currentDir, CONFIG_FILE_NAME))) {
      return currentDir;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load configuration from a directory
 *
 * Looks for promptdeck.config.yaml in cwd only (no walking up).
 *
 * @returns Loaded configuration or undefined if missing or invalid
 */
export async function findAndLoadConfig(
  cwd: string = process.cwd()
): Promise<ProjectConfig | undefined> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    logDebug('config', `No config file at ${configPath}`);
    return undefined;
  }

  try {
    return await loadConfigFromFile(configPath);
  } catch (err) {
    logWarning('config', `Ignoring invalid config ${configPath}`, err instanceof Error ? err : new Error(String(err)));
    return undefined;
  }
}
