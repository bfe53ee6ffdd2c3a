import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runDiff } from './diff.js';
import { createWorkspace, lexiDocument, type TestWorkspace } from '../test-helpers/workspace.js';

describe('runDiff', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await workspace.writeJson(
      'before.lexi.json',
      lexiDocument([
        { key: 'greeting', language: 'en', value: 'Hello' },
        { key: 'title', language: 'en', value: 'Home' },
      ])
    );
    await workspace.writeJson(
      'after.lexi.json',
      lexiDocument([
        { key: 'greeting', language: 'en', value: 'Hi' },
        { key: 'greeting', language: 'fr', value: 'Salut' },
      ])
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.dispose();
  });

  it('reports added, removed and changed keys per language', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const { report, summary } = await runDiff({
      source: 'before.lexi.json',
      target: 'after.lexi.json',
      cwd: workspace.root,
    });

    expect(report).toEqual({
      en: {
        added: [],
        removed: ['title'],
        changed: [
          {
            key: 'greeting',
            before: { kind: 'singular', value: 'Hello' },
            after: { kind: 'singular', value: 'Hi' },
            beforeStatus: 'translated',
            afterStatus: 'translated',
          },
        ],
        unchanged: 0,
      },
      fr: { added: ['greeting'], removed: [], changed: [], unchanged: 0 },
    });
    expect(summary).toEqual({ languages: 2, added: 1, removed: 1, changed: 1, unchanged: 0 });
  });

  it('prints only the language-keyed JSON report with --json and writes it to a file', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runDiff({
      source: 'before.lexi.json',
      target: 'after.lexi.json',
      lang: 'fr',
      json: true,
      output: 'reports/diff.json',
      cwd: workspace.root,
    });

    const expected = { fr: { added: ['greeting'], removed: [], changed: [], unchanged: 0 } };
    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual(expected);
    expect(await workspace.readJson('reports/diff.json')).toEqual(expected);
  });

  it('builds one unified patch per changed language', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const { patches } = await runDiff({
      source: 'before.lexi.json',
      target: 'after.lexi.json',
      patchDir: 'patches',
      cwd: workspace.root,
    });

    expect(patches.map((patch) => patch.language)).toEqual(['en', 'fr']);
    expect(patches[0].patch).toContain('-greeting = "Hello" [translated]');
    expect(patches[0].patch).toContain('+greeting = "Hi" [translated]');
    expect(patches[0].patch).toContain('-title = "Home" [translated]');
    expect(patches[1].patch).toContain('+greeting = "Salut" [translated]');
    expect(await workspace.exists('patches/en.patch')).toBe(true);
    expect(await workspace.exists('patches/fr.patch')).toBe(true);
  });

  it('finds no differences between identical files', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const { summary, patches } = await runDiff({
      source: 'before.lexi.json',
      target: 'before.lexi.json',
      patch: true,
      cwd: workspace.root,
    });

    expect(summary).toEqual({ languages: 1, added: 0, removed: 0, changed: 0, unchanged: 2 });
    expect(patches).toEqual([]);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('No differences found.'));
  });
});
