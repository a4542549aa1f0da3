/**
 * Package Publisher
 *
 * Publishes the project's packages to the npm registry with a dist-tag
 * derived from the version:
 *
 * - X.Y.Z          → latest (stable release)
 * - X.Y.Z-rc.N     → next (release candidate)
 * - X.Y.Z-next.N   → next
 * - X.Y.Z-beta.N   → beta
 * - X.Y.Z-alpha.N  → alpha
 * - X.Y.Z-canary.N → canary
 * - anything else  → next
 *
 * Nothing runs until the upload token is present. There is no retry and no
 * rollback: the first failing command stops the run.
 */

import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { createSafeValidator, type PublishConfig } from '@promptdeck/config';
import { isToolAvailable, logDebug, safeExecSync } from '@promptdeck/utils';
import * as semver from 'semver';
import { z } from 'zod';

/** Environment variable npm reads the token from (via the .npmrc setup-node writes) */
export const NPM_TOKEN_CHILD_ENV = 'NODE_AUTH_TOKEN';

export class MissingCredentialError extends Error {
  public readonly tokenEnv: string;

  constructor(tokenEnv: string) {
    super(`Set the ${tokenEnv} variable in your repository secrets`);
    this.name = 'MissingCredentialError';
    this.tokenEnv = tokenEnv;
  }
}

export class PublishError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PublishError';
  }
}

export const PackageManifestSchema = z.object({
  name: z.string().min(1, 'name is required'),
  version: z.string().min(1, 'version is required'),
  private: z.boolean().optional(),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

const safeValidateManifest = createSafeValidator(PackageManifestSchema);

export interface CommandRunOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/** Runs one external command, throwing when it fails */
export type CommandRunner = (command: string, args: string[], options: CommandRunOptions) => void;

export const defaultCommandRunner: CommandRunner = (command, args, options) => {
  safeExecSync(command, args, { cwd: options.cwd, env: options.env, stdio: 'inherit' });
};

export interface PublishOptions {
  /** Directory the package directories and the build script are relative to */
  rootDir: string;
  config: PublishConfig;
  dryRun?: boolean;
  skipBuild?: boolean;
  /** dist-tag override */
  tag?: string;
}

export interface PublishDeps {
  env?: NodeJS.ProcessEnv;
  runCommand?: CommandRunner;
  /** PATH lookup used to check for npm before building */
  isToolAvailable?: (toolName: string) => boolean;
}

export interface PublishResult {
  version: string;
  tag: string;
  /** Package names, in publish order */
  published: string[];
  /** Private package names */
  skipped: string[];
  dryRun: boolean;
}

const PRERELEASE_TAGS: Partial<Record<string, string>> = {
  rc: 'next',
  next: 'next',
  beta: 'beta',
  alpha: 'alpha',
  canary: 'canary',
};

/**
 * Determine npm dist-tag from a version
 *
 * @example
 * determineTag('1.2.0');         // 'latest'
 * determineTag('1.2.0-rc.1');    // 'next'
 * determineTag('1.2.0-beta2');   // 'beta'
 *
 * @throws PublishError for a version that is not valid semver
 */
export function determineTag(version: string): string {
  if (!semver.valid(version)) {
    throw new PublishError(`Invalid version '${version}'`);
  }

  const prerelease = semver.prerelease(version);
  if (!prerelease || prerelease.length === 0) {
    return 'latest';
  }

  const id = /^[a-z]+/i.exec(String(prerelease[0]));
  return (id && PRERELEASE_TAGS[id[0].toLowerCase()]) ?? 'next';
}

function readManifest(packageDir: string): PackageManifest {
  const manifestPath = join(packageDir, 'package.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  } catch (error) {
    throw new PublishError(`Cannot read ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = safeValidateManifest(raw);
  if (!result.success) {
    throw new PublishError(`Invalid ${manifestPath}:\n${result.errors.map(err => `  • ${err}`).join('\n')}`);
  }
  return result.data;
}

function publishArgs(config: PublishConfig, tag: string, env: NodeJS.ProcessEnv, dryRun: boolean): string[] {
  const args = ['publish', '--tag', tag, '--access', config.access];
  if (config.registry) {
    args.push('--registry', config.registry);
  }
  if (config.provenance && env.CI === 'true' && env.GITHUB_ACTIONS === 'true') {
    args.push('--provenance');
  }
  if (dryRun) {
    args.push('--dry-run');
  }
  return args;
}

/**
 * Build and publish the configured packages
 *
 * @throws MissingCredentialError before any command runs when the token is unset or empty
 * @throws PublishError for unreadable manifests, invalid or differing versions, or npm missing from PATH
 * @throws CommandExecutionError when the build or an upload fails
 */
export async function publishPackages(options: PublishOptions, deps: PublishDeps = {}): Promise<PublishResult> {
  const env = deps.env ?? process.env;
  const runCommand = deps.runCommand ?? defaultCommandRunner;
  const toolAvailable = deps.isToolAvailable ?? isToolAvailable;
  const { config, rootDir } = options;
  const dryRun = options.dryRun ?? false;

  const token = env[config.tokenEnv];
  if (token === undefined || token === '') {
    throw new MissingCredentialError(config.tokenEnv);
  }

  const packages = config.packages.map(dir => {
    const packageDir = resolve(rootDir, dir);
    return { dir: packageDir, manifest: readManifest(packageDir) };
  });

  const skipped = packages.filter(pkg => pkg.manifest.private).map(pkg => pkg.manifest.name);
  const publishable = packages.filter(pkg => !pkg.manifest.private);
  if (publishable.length === 0) {
    throw new PublishError('Nothing to publish: every configured package is private');
  }

  for (const pkg of publishable) {
    if (!semver.valid(pkg.manifest.version)) {
      throw new PublishError(`Invalid version '${pkg.manifest.version}' in ${pkg.manifest.name}`);
    }
  }

  const versions = new Set(publishable.map(pkg => pkg.manifest.version));
  if (versions.size > 1) {
    const listing = publishable.map(pkg => `${pkg.manifest.name}@${pkg.manifest.version}`).join(', ');
    throw new PublishError(`Package versions differ: ${listing}`);
  }

  const version = publishable[0].manifest.version;
  const tag = options.tag ?? determineTag(version);

  if (!toolAvailable('npm')) {
    throw new PublishError('npm was not found on PATH');
  }

  const childEnv: NodeJS.ProcessEnv = { ...env, [NPM_TOKEN_CHILD_ENV]: token };

  if (options.skipBuild) {
    logDebug('publish', 'Skipping build');
  } else {
    logDebug('publish', `Building with npm run ${config.buildScript}`, { rootDir });
    runCommand('npm', ['run', config.buildScript], { cwd: rootDir, env: childEnv });
  }

  const args = publishArgs(config, tag, env, dryRun);
  const published: string[] = [];
  for (const pkg of publishable) {
    logDebug('publish', `Publishing ${pkg.manifest.name}@${version}`, { tag, dryRun, dir: pkg.dir });
    runCommand('npm', args, { cwd: pkg.dir, env: childEnv });
    published.push(pkg.manifest.name);
  }

  return { version, tag, published, skipped, dryRun };
}
