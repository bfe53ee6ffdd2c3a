import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PluralValidationError, createEntry, createResource, plural, singular } from '@lexiforge/core';
import { renderView, runView, truncateDisplay } from './view.js';
import { createWorkspace, lexiDocument, type TestWorkspace } from '../test-helpers/workspace.js';

const resource = createResource([
  createEntry({ key: 'welcome_message_for_new_users_title', language: 'en', value: singular('Hello') }),
  createEntry({ key: 'apples', language: 'en', value: plural({ one: '%d apple', other: '%d apples' }) }),
  createEntry({ key: 'notice', language: 'fr', value: singular('Ligne 1\nLigne 2') }),
]);

describe('renderView', () => {
  it('prints tab-separated lines for pipes, with a language column when needed', () => {
    expect(renderView(resource)).toEqual([
      'welcome_message_for_new_users_title\ten\tHello',
      'apples\ten\tone: %d apple | other: %d apples',
      'notice\tfr\tLigne 1\\nLigne 2',
    ]);
    expect(renderView(resource, { language: 'en' })).toEqual([
      'welcome_message_for_new_users_title\tHello',
      'apples\tone: %d apple | other: %d apples',
    ]);
  });

  it('aligns and truncates columns for a terminal', () => {
    expect(renderView(resource, { language: 'en', tty: true, width: 80 })).toEqual([
      `${'Key'.padEnd(24)} Value`,
      'welcome_message_for_n... Hello',
      `${'apples'.padEnd(24)} one: %d apple | other: %d apples`,
    ]);
    expect(renderView(resource, { language: 'en', tty: true, full: true })[1]).toBe(
      'welcome_message_for_new_users_title Hello'
    );
  });

  it('truncates by characters', () => {
    expect(truncateDisplay('abcdef', 6)).toBe('abcdef');
    expect(truncateDisplay('abcdefg', 6)).toBe('abc...');
    expect(truncateDisplay('abcdefg', 2)).toBe('..');
  });
});

describe('runView', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.dispose();
  });

  it('checks plural categories after printing', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await workspace.writeJson(
      'ok.lexi.json',
      lexiDocument([{ key: 'apples', language: 'en', value: { one: '%d apple', other: '%d apples' } }])
    );
    await workspace.writeJson('bad.lexi.json', lexiDocument([{ key: 'apples', language: 'pl', value: { other: '%d' } }]));

    const lines = await runView({ input: 'ok.lexi.json', checkPlurals: true, cwd: workspace.root });
    expect(lines).toHaveLength(process.stdout.isTTY ? 2 : 1);
    expect(log).toHaveBeenLastCalledWith(expect.stringContaining('Plural validation passed'));

    await expect(runView({ input: 'bad.lexi.json', checkPlurals: true, cwd: workspace.root })).rejects.toThrow(
      PluralValidationError
    );
  });
});
