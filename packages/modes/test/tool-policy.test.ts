import { describe, it, expect } from 'vitest';

import type { ActiveModes } from '../src/schema.js';
import { createToolPolicy, type ToolCatalog } from '../src/tool-policy.js';

const catalog: ToolCatalog = {
  available: ['read_file', 'list_dir', 'create_text_file', 'delete_lines'],
  optional: ['switch_modes', 'summarize'],
};

function active(overrides: Partial<ActiveModes> = {}): ActiveModes {
  return { names: [], prompt: '', excludedTools: [], includedOptionalTools: [], ...overrides };
}

describe('createToolPolicy', () => {
  it('should allow every available tool and no optional tool without active modes', () => {
    const policy = createToolPolicy(active(), catalog);

    expect(policy.allowed).toEqual(['read_file', 'list_dir', 'create_text_file', 'delete_lines']);
    expect(policy.isAllowed('switch_modes')).toBe(false);
  });

  it('should remove excluded tools', () => {
    const policy = createToolPolicy(active({ excludedTools: ['create_text_file', 'delete_lines'] }), catalog);

    expect(policy.allowed).toEqual(['read_file', 'list_dir']);
    expect(policy.excluded).toEqual(['create_text_file', 'delete_lines']);
    expect(policy.isAllowed('delete_lines')).toBe(false);
  });

  it('should switch on included optional tools', () => {
    const policy = createToolPolicy(active({ includedOptionalTools: ['summarize'] }), catalog);

    expect(policy.allowed).toEqual([
      'read_file',
      'list_dir',
      'create_text_file',
      'delete_lines',
      'summarize',
    ]);
  });

  it('should let an exclusion win over an inclusion', () => {
    const policy = createToolPolicy(
      active({ excludedTools: ['summarize'], includedOptionalTools: ['summarize'] }),
      catalog
    );

    expect(policy.isAllowed('summarize')).toBe(false);
  });

  it('should allow tools outside the catalog unless excluded', () => {
    const policy = createToolPolicy(active({ excludedTools: ['execute_shell_command'] }), catalog);

    expect(policy.filter(['find_symbol', 'execute_shell_command', 'read_file'])).toEqual(['find_symbol', 'read_file']);
  });

  it('should report exclusions that name no catalog tool', () => {
    const policy = createToolPolicy(active({ excludedTools: ['delete_lines', 'insert_at_line'] }), catalog);

    expect(policy.unknownExclusions).toEqual(['insert_at_line']);
  });

  it('should not report unknown exclusions for an empty catalog', () => {
    const policy = createToolPolicy(active({ excludedTools: ['insert_at_line'] }), { available: [], optional: [] });

    expect(policy.unknownExclusions).toEqual([]);
    expect(policy.allowed).toEqual([]);
  });
});
