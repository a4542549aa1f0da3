import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { validateConfig } from '@promptdeck/config';
import { createTempTestDir, removeTempTestDir } from '@promptdeck/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  ConfigLoadError,
  findConfigPath,
  loadConfigWithErrors,
  loadProjectConfig,
} from '../src/utils/config-loader.js';

describe('config-loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('promptdeck-config-loader-');
  });

  afterEach(async () => {
    await removeTempTestDir(testDir);
  });

  describe('findConfigPath', () => {
    it('should find the config file from a subdirectory', () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), 'prompts:\n  dir: templates\n');
      const nested = join(testDir, 'packages', 'app');
      mkdirSync(nested, { recursive: true });

      expect(findConfigPath(nested)).toBe(join(testDir, 'promptdeck.config.yaml'));
    });
  });

  describe('loadConfigWithErrors', () => {
    it('should return the validated config', async () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), 'modes:\n  active: [planning]\n');

      const result = await loadConfigWithErrors(testDir);

      expect(result.errors).toBeNull();
      expect(result.filePath).toBe(join(testDir, 'promptdeck.config.yaml'));
      expect(result.config?.modes.active).toEqual(['planning']);
    });

    it('should return field errors for an invalid file', async () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), 'publish:\n  access: everyone\n  retries: 3\n');

      const result = await loadConfigWithErrors(testDir);

      expect(result.config).toBeNull();
      expect(result.errors).toEqual([
        "publish.access: Invalid enum value. Expected 'public' | 'restricted', received 'everyone'",
        "publish: Unrecognized key(s) in object: 'retries'",
      ]);
    });

    it('should return the parse error for a file that is not a mapping', async () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), '- just\n- a list\n');

      const result = await loadConfigWithErrors(testDir);

      expect(result.config).toBeNull();
      expect(result.errors).toEqual(['Configuration must be an object']);
    });
  });

  describe('loadProjectConfig', () => {
    it('should use defaults rooted at the working directory without a file', async () => {
      // The temp dir sits outside any project, so nothing is found walking up
      const loaded = await loadProjectConfig(testDir);

      expect(loaded).toEqual({ config: validateConfig({}), rootDir: testDir, configPath: null });
    });

    it('should root relative paths at the config file directory', async () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), 'prompts:\n  dir: templates\n');
      const nested = join(testDir, 'src');
      mkdirSync(nested);

      const loaded = await loadProjectConfig(nested);

      expect(loaded.rootDir).toBe(testDir);
      expect(loaded.config.prompts.dir).toBe('templates');
    });

    it('should throw ConfigLoadError with the field errors', async () => {
      writeFileSync(join(testDir, 'promptdeck.config.yaml'), 'tools:\n  available: read_file\n');

      let caught: unknown;
      try {
        await loadProjectConfig(testDir);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigLoadError);
      if (caught instanceof ConfigLoadError) {
        expect(caught.message).toBe(`Configuration is invalid: ${join(testDir, 'promptdeck.config.yaml')}`);
        expect(caught.errors).toEqual(['tools.available: Expected array, received string']);
      }
    });
  });
});
