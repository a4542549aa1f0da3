import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@promptdeck/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { PromptFactoryBase } from '../src/factory.js';
import type { PromptList } from '../src/prompt-list.js';

class ReviewPrompts extends PromptFactoryBase {
  createReviewRequest(params: { author: unknown; files: unknown }): string {
    return this.renderPrompt('review_request', params);
  }

  getChecklistList(): PromptList {
    return this.getPromptList('checklist');
  }
}

describe('PromptFactoryBase', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('promptdeck-factory-');
    writeFileSync(
      join(testDir, 'default.yml'),
      [
        'prompts:',
        '  review_request: "Review {{files}} by {{author}}"',
        '  checklist:',
        '    - Tests pass',
        '    - Docs updated',
        '',
      ].join('\n')
    );
    writeFileSync(
      join(testDir, 'de.yml'),
      ['lang: de', 'prompts:', '  review_request: "Prüfe {{files}} von {{author}}"', ''].join('\n')
    );
  });

  afterEach(async () => {
    await removeTempTestDir(testDir);
  });

  it('should load a subclass bound to the default language', async () => {
    const prompts = await ReviewPrompts.load(testDir);

    expect(prompts).toBeInstanceOf(ReviewPrompts);
    expect(prompts.language).toBe('default');
    expect(prompts.createReviewRequest({ author: 'sam', files: 'a.ts' })).toBe('Review a.ts by sam');
    expect(prompts.getChecklistList().toString()).toBe('Tests pass\n * Docs updated');
  });

  it('should render in the requested language', async () => {
    const prompts = await ReviewPrompts.load(testDir, { language: 'de' });

    expect(prompts.createReviewRequest({ author: 'sam', files: 'a.ts' })).toBe('Prüfe a.ts von sam');
  });

  it('should use the fallback for prompts missing in the language', async () => {
    const prompts = await ReviewPrompts.load(testDir, { language: 'de', fallback: 'default' });

    expect(prompts.getChecklistList().items).toEqual(['Tests pass', 'Docs updated']);
  });

  it('should fail without a fallback for prompts missing in the language', async () => {
    const prompts = await ReviewPrompts.load(testDir, { language: 'de' });

    expect(() => prompts.getChecklistList()).toThrow("Item for language 'de' not found for name 'checklist'");
  });
});
