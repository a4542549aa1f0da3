/**
 * Shared Test Helpers
 *
 * Common utilities for tests across all packages
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { normalizedTmpdir } from './path-helpers.js';

/**
 * Create a unique temporary test directory
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(async () => {
 *   testDir = await createTempTestDir();
 * });
 * afterEach(async () => {
 *   await removeTempTestDir(testDir);
 * });
 * ```
 */
export async function createTempTestDir(prefix = 'promptdeck-test-'): Promise<string> {
  return mkdtemp(join(normalizedTmpdir(), prefix));
}

export async function removeTempTestDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
