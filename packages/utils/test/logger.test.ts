/**
 * Tests for logger utilities
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { logDebug, logWarning, logError, DEBUG_ENV_VAR } from '../src/logger.js';

describe('logger', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    vi.useRealTimers();
    delete process.env[DEBUG_ENV_VAR];
  });

  describe(`${DEBUG_ENV_VAR} not set`, () => {
    it('should suppress debug and warning output', () => {
      logDebug('prompts', 'hidden');
      logWarning('modes', 'hidden', new Error('boom'));

      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should always print errors', () => {
      logError('publish', 'Upload failed');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith('[2026-01-02T03:04:05.000Z] [ERROR] [publish] Upload failed');
    });
  });

  describe(`${DEBUG_ENV_VAR}=1`, () => {
    beforeEach(() => {
      process.env[DEBUG_ENV_VAR] = '1';
    });

    it('should print debug messages with metadata', () => {
      logDebug('prompts', 'Skipping non-YAML file', { file: 'README.md' });

      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, '[2026-01-02T03:04:05.000Z] [DEBUG] [prompts] Skipping non-YAML file');
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(2, JSON.stringify({ file: 'README.md' }, null, 2));
    });

    it('should print warnings with the error message', () => {
      logWarning('config', 'Falling back to defaults', new Error('no file'));

      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, '[2026-01-02T03:04:05.000Z] [WARN] [config] Falling back to defaults');
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(2, 'Error: no file');
    });
  });
});
