/**
 * @promptdeck/modes
 *
 * Agent modes: a prompt plus the tools the agent may not use (or may
 * additionally use) while the mode is active.
 *
 * @example
 * ```typescript
 * import { createModeRegistry, createToolPolicy } from '@promptdeck/modes';
 *
 * const registry = await createModeRegistry({ dirs: ['modes'] });
 * const active = registry.resolve(['planning']);
 * const policy = createToolPolicy(active, { available: ['read_file', 'create_text_file'], optional: [] });
 * policy.allowed; // ['read_file']
 * ```
 */

export { ModeError, ModeLoadError, UnknownModeError, DuplicateModeError } from './errors.js';

export {
  BUILTIN_ORIGIN,
  ModeFileSchema,
  safeValidateModeFile,
  type ModeFile,
  type AgentMode,
  type ActiveModes,
} from './schema.js';

export {
  BUILTIN_MODES_DIR,
  loadModeFile,
  loadModesFromDir,
  loadBuiltinModes,
  type LoadModesOptions,
} from './loader.js';

export {
  ModeRegistry,
  createModeRegistry,
  type RegisterModeOptions,
  type CreateModeRegistryOptions,
} from './registry.js';

export { createToolPolicy, type ToolCatalog, type ToolPolicy } from './tool-policy.js';
