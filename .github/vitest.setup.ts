/**
 * Global Vitest Setup
 *
 * Runs before each test so variables set by the parent shell or an earlier
 * test do not change logging or publishing behaviour.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('PROMPTDECK_')) {
      delete process.env[key];
    }
  }

  // Upload token read by the publish command
  delete process.env.NPM_TOKEN;

  // CI is preserved; publish tests pass their own environment where it matters
});
