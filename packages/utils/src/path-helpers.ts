/**
 * Path Helpers
 *
 * @package @promptdeck/utils
 */

import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';

/**
 * Get the real path of the OS temp directory
 *
 * tmpdir() can return a symlinked path (/var vs /private/var on macOS) or a
 * Windows 8.3 short name. Paths built from it then differ from what
 * realpath-based code reports.
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}
