import { logDebug } from '@promptdeck/utils';

import { DuplicateModeError, UnknownModeError } from './errors.js';
import { loadBuiltinModes, loadModesFromDir } from './loader.js';
import { BUILTIN_ORIGIN, type ActiveModes, type AgentMode } from './schema.js';

export interface RegisterModeOptions {
  /** Replace a mode already registered under the same name (default: false) */
  allowOverride?: boolean;
}

function sortedUnion(lists: readonly (readonly string[])[]): string[] {
  return [...new Set(lists.flat())].sort();
}

/**
 * Registry of known agent modes
 *
 * Several modes can be active at once; {@link ModeRegistry.resolve} merges them.
 */
export class ModeRegistry {
  private readonly modes = new Map<string, AgentMode>();

  register(mode: AgentMode, options: RegisterModeOptions = {}): void {
    const existing = this.modes.get(mode.name);
    if (existing && !options.allowOverride) {
      throw new DuplicateModeError(mode.name, existing.origin, mode.origin);
    }
    this.modes.set(mode.name, mode);
  }

  has(name: string): boolean {
    return this.modes.has(name);
  }

  /**
   * @throws UnknownModeError listing the known modes
   */
  get(name: string): AgentMode {
    const mode = this.modes.get(name);
    if (!mode) {
      throw new UnknownModeError(name, this.names());
    }
    return mode;
  }

  /** Known mode names, sorted */
  names(): string[] {
    return [...this.modes.keys()].sort();
  }

  /** Known modes, sorted by name */
  list(): AgentMode[] {
    return this.names().map(name => this.get(name));
  }

  /**
   * Combine modes into the active set
   *
   * Repeated names count once. Prompts follow the order of `names`.
   *
   * @example
   * registry.resolve(['planning', 'editing']).prompt; // planning prompt, blank line, editing prompt
   */
  resolve(names: readonly string[]): ActiveModes {
    const uniqueNames = [...new Set(names)];
    const modes = uniqueNames.map(name => this.get(name));

    return {
      names: uniqueNames,
      prompt: modes.map(mode => mode.prompt).join('\n\n'),
      excludedTools: sortedUnion(modes.map(mode => mode.excludedTools)),
      includedOptionalTools: sortedUnion(modes.map(mode => mode.includedOptionalTools)),
    };
  }
}

export interface CreateModeRegistryOptions {
  /** Register the built-in modes first (default: true) */
  includeBuiltins?: boolean;
  /** Project mode directories, loaded in order */
  dirs?: readonly string[];
}

/**
 * Build a registry from the built-in modes and project mode directories
 *
 * A project mode may replace a built-in mode of the same name; two project
 * modes with one name are an error.
 *
 * @throws ModeLoadError for a missing directory or invalid mode file
 * @throws DuplicateModeError for a name defined twice by the project
 */
export async function createModeRegistry(options: CreateModeRegistryOptions = {}): Promise<ModeRegistry> {
  const registry = new ModeRegistry();

  if (options.includeBuiltins ?? true) {
    for (const mode of await loadBuiltinModes()) {
      registry.register(mode);
    }
  }

  for (const dir of options.dirs ?? []) {
    for (const mode of await loadModesFromDir(dir)) {
      const overridesBuiltin = registry.has(mode.name) && registry.get(mode.name).origin === BUILTIN_ORIGIN;
      if (overridesBuiltin) {
        logDebug('modes', `Mode '${mode.name}' from ${mode.origin} replaces the built-in mode`);
      }
      registry.register(mode, { allowOverride: overridesBuiltin });
    }
  }

  return registry;
}
