import { describe, it, expect } from 'vitest';

import {
  safeExecSync,
  isToolAvailable,
  CommandExecutionError,
} from '../src/safe-exec.js';

const MISSING_TOOL = 'promptdeck-definitely-not-installed-tool';

describe('safeExecSync', () => {
  it('should return string output when encoding is specified', () => {
    const result = safeExecSync('node', ['-e', 'process.stdout.write("ok")'], { encoding: 'utf8' });
    expect(result).toBe('ok');
  });

  it('should pass custom environment variables to the child', () => {
    const result = safeExecSync(
      'node',
      ['-e', 'process.stdout.write(process.env.SAFE_EXEC_TEST ?? "")'],
      { encoding: 'utf8', env: { ...process.env, SAFE_EXEC_TEST: 'test-value' } },
    );
    expect(result).toBe('test-value');
  });

  it('should not interpret shell syntax in arguments', () => {
    const result = safeExecSync(
      'node',
      ['-e', 'process.stdout.write(process.argv[1])', '$(echo injected) && exit 1'],
      { encoding: 'utf8' },
    );
    expect(result).toBe('$(echo injected) && exit 1');
  });

  it('should throw CommandExecutionError with status on non-zero exit', () => {
    let caught: unknown;
    try {
      safeExecSync('node', ['-e', 'process.exit(3)']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CommandExecutionError);
    if (caught instanceof CommandExecutionError) {
      expect(caught.status).toBe(3);
      expect(caught.command).toBe('node -e process.exit(3)');
      expect(caught.message).toBe('Command failed with exit code 3: node -e process.exit(3)');
    }
  });

  it('should throw when the command is not on PATH', () => {
    expect(() => safeExecSync(MISSING_TOOL, ['--version'])).toThrow();
  });
});

describe('isToolAvailable', () => {
  it('should find node', () => {
    expect(isToolAvailable('node')).toBe(true);
  });

  it('should return false for a missing tool', () => {
    expect(isToolAvailable(MISSING_TOOL)).toBe(false);
  });
});
