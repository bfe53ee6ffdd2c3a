import { describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createEntry, createResource, plural, singular } from '@lexiforge/core';
import { buildLanguagePatches, printLanguagePatches, renderCanonical, writeLanguagePatches } from './diff-utils.js';

const before = createResource([
  createEntry({ key: 'title', language: 'en', value: singular('Home') }),
  createEntry({ key: 'apples', language: 'en', value: plural({ one: '%d apple', other: '%d apples' }) }),
  createEntry({ key: 'title', language: 'de', value: singular('Start') }),
]);

const after = createResource([
  createEntry({ key: 'title', language: 'en', value: singular('Home'), status: 'stale' }),
  createEntry({ key: 'apples', language: 'en', value: plural({ one: '%d apple', other: '%d apples' }) }),
  createEntry({ key: 'title', language: 'de', value: singular('Start') }),
]);

describe('diff-utils', () => {
  it('renders one sorted line per entry of a language', () => {
    expect(renderCanonical(before, 'en')).toBe(
      'apples = "one: %d apple | other: %d apples" [translated]\ntitle = "Home" [translated]\n'
    );
    expect(renderCanonical(before, 'fr')).toBe('');
  });

  it('builds patches only for languages that differ', () => {
    const patches = buildLanguagePatches(before, after, { source: 'a.lexi.json', target: 'b.lexi.json' });

    expect(patches.map((entry) => entry.language)).toEqual(['en']);
    expect(patches[0].patch).toContain('-title = "Home" [translated]');
    expect(patches[0].patch).toContain('+title = "Home" [stale]');
  });

  it('writes patch files named after each language', async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'lexiforge-diff-'));
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      const written = await writeLanguagePatches(
        [
          { language: 'en', patch: '--- a\n+++ b\n+hello\n' },
          { language: 'pt_BR', patch: '--- a\n+++ b\n+olá\n' },
        ],
        tmp
      );

      expect(written).toEqual([path.join(tmp, 'en.patch'), path.join(tmp, 'pt_BR.patch')]);
      expect(await fs.readFile(path.join(tmp, 'en.patch'), 'utf8')).toBe('--- a\n+++ b\n+hello\n');
    } finally {
      spy.mockRestore();
      await fs.rm(tmp, { recursive: true, force: true });
    }
  });

  it('prints a notice when there is nothing to show', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printLanguagePatches([]);
    expect(spy).toHaveBeenCalledWith(expect.stringContaining('No differences to display.'));
    spy.mockRestore();
  });
});
