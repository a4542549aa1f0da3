/**
 * Mode File Schema
 *
 * ```yaml
 * # planning.yml (the file name is the mode name)
 * description: Only read-only tools, focused on analysis and planning
 * prompt: |
 *   You are in planning mode. ...
 * excludedTools:
 *   - create_text_file
 * includedOptionalTools: []
 * ```
 */

import { createSafeValidator } from '@promptdeck/config';
import { z } from 'zod';

/** Origin of modes shipped with promptdeck */
export const BUILTIN_ORIGIN = 'builtin';

const ToolNameSchema = z.string().min(1, 'Tool name cannot be empty');

export const ModeFileSchema = z.object({
  description: z.string().default(''),

  /** Appended to the agent's system prompt while the mode is active */
  prompt: z.string().trim().min(1, 'prompt cannot be empty'),

  /** Tools the agent may not use while the mode is active */
  excludedTools: z.array(ToolNameSchema).default([]),

  /** Optional tools the mode switches on */
  includedOptionalTools: z.array(ToolNameSchema).default([]),
}).strict();

export type ModeFile = z.infer<typeof ModeFileSchema>;

export const safeValidateModeFile = createSafeValidator(ModeFileSchema);

export interface AgentMode extends ModeFile {
  name: string;
  /** BUILTIN_ORIGIN or the path of the mode file */
  origin: string;
}

/** The combined effect of one or more active modes */
export interface ActiveModes {
  /** Mode names in activation order */
  names: string[];
  /** Mode prompts joined by a blank line */
  prompt: string;
  excludedTools: string[];
  includedOptionalTools: string[];
}
