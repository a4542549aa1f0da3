#!/usr/bin/env tsx
/**
 * promptdeck CLI Entry Point
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { logError } from '@promptdeck/utils';
import { z } from 'zod';

import { createProgram } from './program.js';

const PackageVersionSchema = z.object({ version: z.string() });

// Same relative path from src/ and dist/
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');

let version = '0.0.0';
try {
  version = PackageVersionSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
} catch (error) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
}

try {
  await createProgram(version).parseAsync(process.argv);
} catch (error) {
  logError('cli', 'Unexpected CLI failure', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
}
