import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | 'inherit' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Environment variables for the child (default: inherited from this process) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Error thrown when a command exits with a non-zero status
 */
export class CommandExecutionError extends Error {
  public readonly command: string;
  public readonly status: number;
  public readonly stdout: Buffer | string;
  public readonly stderr: Buffer | string;

  constructor(
    command: string,
    status: number,
    stdout: Buffer | string,
    stderr: Buffer | string,
  ) {
    super(`Command failed with exit code ${status}: ${command}`);
    this.name = 'CommandExecutionError';
    this.command = command;
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Windows needs a shell for `node` itself and for .cmd/.bat/.ps1 shims
 * (npm, npx). The path was already resolved by which, so no lookup happens
 * through the shell.
 */
function needsShell(command: string, commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }
  if (command === 'node') {
    return true;
  }
  return /\.(cmd|bat|ps1)$/i.test(commandPath);
}

function spawnResolved(command: string, args: string[], options: SafeExecOptions) {
  const commandPath = which.sync(command);
  const shell = needsShell(command, commandPath);

  const spawnOptions: SpawnSyncOptions = {
    shell,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    timeout: options.timeout,
    encoding: options.encoding,
  };

  return spawnSync(shell ? command : commandPath, args, spawnOptions);
}

/**
 * Run a command without a shell interpreter
 *
 * The binary is resolved on PATH with `which` and executed by absolute path,
 * so arguments are never re-parsed by a shell.
 *
 * @returns stdout (string when `encoding` is set)
 * @throws Error if the command is not found or cannot be spawned
 * @throws CommandExecutionError if the command exits non-zero
 *
 * @example
 * safeExecSync('npm', ['publish', '--tag', 'next'], {
 *   cwd: packageDir,
 *   stdio: 'inherit',
 *   env: { ...process.env, NODE_AUTH_TOKEN: token },
 * });
 */
export function safeExecSync(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): Buffer | string {
  const result = spawnResolved(command, args, options);

  if (result.error) {
    throw result.error;
  }

  if (result.status !== 0) {
    throw new CommandExecutionError(
      [command, ...args].join(' '),
      result.status ?? -1,
      result.stdout,
      result.stderr,
    );
  }

  return result.stdout;
}

/**
 * Check whether a command-line tool can be found on PATH
 */
export function isToolAvailable(toolName: string): boolean {
  return which.sync(toolName, { nothrow: true }) !== null;
}
