/**
 * Tool Policy
 *
 * Decides which tools of the agent's catalog the active modes allow. A tool
 * is allowed when no active mode excludes it and, for optional tools, when an
 * active mode includes it.
 */

import type { ActiveModes } from './schema.js';

export interface ToolCatalog {
  /** Tools on by default */
  available: readonly string[];
  /** Tools off unless a mode includes them */
  optional: readonly string[];
}

export interface ToolPolicy {
  /** Catalog tools the agent may use, available tools first */
  allowed: string[];
  excluded: string[];
  /** Exclusions that name no catalog tool (empty when the catalog is empty) */
  unknownExclusions: string[];
  isAllowed(tool: string): boolean;
  filter(tools: readonly string[]): string[];
}

export function createToolPolicy(active: ActiveModes, catalog: ToolCatalog): ToolPolicy {
  const excluded = new Set(active.excludedTools);
  const included = new Set(active.includedOptionalTools);
  const optional = new Set(catalog.optional);
  const known = new Set([...catalog.available, ...catalog.optional]);

  const isAllowed = (tool: string): boolean =>
    !excluded.has(tool) && (!optional.has(tool) || included.has(tool));

  const filter = (tools: readonly string[]): string[] => tools.filter(isAllowed);

  return {
    allowed: filter([...known]),
    excluded: [...active.excludedTools],
    unknownExclusions: known.size > 0 ? active.excludedTools.filter(tool => !known.has(tool)) : [],
    isAllowed,
    filter,
  };
}
