import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WriteError } from '@lexiforge/core';
import { runConvert } from './convert.js';
import { createWorkspace, lexiDocument, type TestWorkspace } from '../test-helpers/workspace.js';

describe('runConvert', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.dispose();
  });

  it('converts a .strings table into a lexi document', async () => {
    await workspace.write('en.lproj/Localizable.strings', '"greeting" = "Hello";\n"farewell" = "Bye";\n');

    const summary = await runConvert({
      input: 'en.lproj/Localizable.strings',
      output: 'out/app.lexi.json',
      cwd: workspace.root,
    });

    expect(summary).toMatchObject({ inputFormat: 'strings', outputFormat: 'lexi', entries: 2, warnings: [] });
    expect(await workspace.readJson('out/app.lexi.json')).toEqual({
      version: 1,
      metadata: { language: 'en' },
      entries: [
        { key: 'greeting', language: 'en', value: 'Hello', status: 'translated' },
        { key: 'farewell', language: 'en', value: 'Bye', status: 'translated' },
      ],
    });
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Converted 2 entries from strings to lexi: out/app.lexi.json')
    );
  });

  it('picks the output language from the output path', async () => {
    await workspace.writeJson(
      'app.lexi.json',
      lexiDocument([
        { key: 'greeting', language: 'en', value: 'Hello' },
        { key: 'greeting', language: 'fr', value: 'Bonjour' },
      ])
    );

    await runConvert({ input: 'app.lexi.json', output: 'fr.lproj/Localizable.strings', cwd: workspace.root });

    expect(await workspace.read('fr.lproj/Localizable.strings')).toBe('//: Language: fr\n\n"greeting" = "Bonjour";\n');
  });

  it('collapses plurals with a warning unless strict', async () => {
    await workspace.writeJson(
      'app.lexi.json',
      lexiDocument([{ key: 'apples', language: 'en', value: { one: '%d apple', other: '%d apples' } }])
    );

    const summary = await runConvert({ input: 'app.lexi.json', output: 'en.lproj/Localizable.strings', cwd: workspace.root });
    expect(summary.warnings.map((warning) => warning.message)).toEqual([
      'Plural "apples" written as its "other" form; dropped one',
    ]);
    expect(await workspace.read('en.lproj/Localizable.strings')).toBe('//: Language: en\n\n"apples" = "%d apples";\n');

    await expect(
      runConvert({ input: 'app.lexi.json', output: 'strict/en.lproj/Localizable.strings', strict: true, cwd: workspace.root })
    ).rejects.toThrow(WriteError);
    expect(await workspace.exists('strict/en.lproj/Localizable.strings')).toBe(false);
  });

  it('honours strict mode from the config file', async () => {
    await workspace.writeJson('lexiforge.config.json', { strict: true });
    await workspace.writeJson(
      'app.lexi.json',
      lexiDocument([{ key: 'apples', language: 'en', value: { one: '%d apple', other: '%d apples' } }])
    );

    await expect(
      runConvert({ input: 'app.lexi.json', output: 'app.csv', cwd: workspace.root })
    ).rejects.toThrow(WriteError);
  });

  it('reports missing inputs', async () => {
    await expect(runConvert({ input: 'missing.strings', output: 'out.csv', cwd: workspace.root })).rejects.toThrow(
      /Input file not found: .*missing\.strings/
    );
  });
});
