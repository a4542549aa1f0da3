/**
 * Mode Loader
 *
 * Reads mode files from YAML. The mode name is the file name without its
 * extension.
 */

import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { logDebug } from '@promptdeck/utils';
import { parse as parseYaml } from 'yaml';

import { ModeLoadError } from './errors.js';
import { BUILTIN_ORIGIN, safeValidateModeFile, type AgentMode } from './schema.js';

const MODE_FILE_EXTENSIONS = new Set(['.yml', '.yaml']);

/**
 * Directory holding the built-in modes
 *
 * Same path from source and from dist: packages/modes/{src,dist}/../modes
 */
export const BUILTIN_MODES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../modes');

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load a single mode file
 *
 * @param origin - Recorded on the mode (default: the file path)
 * @throws ModeLoadError if the file cannot be read, parsed or validated
 */
export async function loadModeFile(filePath: string, origin: string = filePath): Promise<AgentMode> {
  let parsed: unknown;
  try {
    parsed = parseYaml(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ModeLoadError(filePath, [describeError(error)]);
  }

  const result = safeValidateModeFile(parsed);
  if (!result.success) {
    throw new ModeLoadError(filePath, result.errors);
  }

  return {
    name: basename(filePath, extname(filePath)),
    origin,
    ...result.data,
  };
}

export interface LoadModesOptions {
  /** Record BUILTIN_ORIGIN instead of each file path */
  builtin?: boolean;
}

/**
 * Load every mode file directly inside a directory, in name order
 *
 * @throws ModeLoadError if the directory does not exist or a file is invalid
 */
export async function loadModesFromDir(dir: string, options: LoadModesOptions = {}): Promise<AgentMode[]> {
  if (!existsSync(dir)) {
    throw new ModeLoadError(dir, ['Mode directory not found']);
  }

  const entries = await readdir(dir, { withFileTypes: true });
  const fileNames = entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b));

  const modes: AgentMode[] = [];
  for (const fileName of fileNames) {
    if (!MODE_FILE_EXTENSIONS.has(extname(fileName))) {
      logDebug('modes', `Skipping non-YAML file: ${fileName}`, { dir });
      continue;
    }
    const filePath = join(dir, fileName);
    modes.push(await loadModeFile(filePath, options.builtin ? BUILTIN_ORIGIN : filePath));
  }
  return modes;
}

export async function loadBuiltinModes(): Promise<AgentMode[]> {
  return loadModesFromDir(BUILTIN_MODES_DIR, { builtin: true });
}
