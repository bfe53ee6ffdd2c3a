import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runValidate, validationExitCode, type FileValidation } from './validate.js';
import { EXIT_CODES } from '../utils/exit-codes.js';
import { createWorkspace, lexiDocument, type TestWorkspace } from '../test-helpers/workspace.js';

describe('runValidate', () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await workspace.writeJson(
      'ok.lexi.json',
      lexiDocument([
        { key: 'greeting', language: 'en', value: 'Hello %@' },
        { key: 'greeting', language: 'fr', value: 'Bonjour %@' },
        { key: 'apples', language: 'en', value: { one: '%d apple', other: '%d apples' } },
      ])
    );
    await workspace.writeJson(
      'plural.lexi.json',
      lexiDocument([{ key: 'apples', language: 'en', value: { other: '%d apples' } }])
    );
    await workspace.writeJson(
      'placeholder.lexi.json',
      lexiDocument([
        { key: 'greeting', language: 'en', value: 'Hello %@' },
        { key: 'greeting', language: 'fr', value: 'Bonjour' },
      ])
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.dispose();
  });

  it('reports findings as warnings in permissive mode', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await runValidate({
      input: ['ok.lexi.json', 'plural.lexi.json', 'placeholder.lexi.json'],
      cwd: workspace.root,
    });

    expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
    const [ok, plural, placeholder] = result.files;
    expect(ok.plurals?.valid).toBe(true);
    expect(ok.placeholders?.valid).toBe(true);
    expect(plural.plurals?.issues).toEqual([
      { key: 'apples', language: 'en', missingCategories: ['one'], presentCategories: ['other'], severity: 'warning' },
    ]);
    expect(placeholder.placeholders?.issues).toEqual([
      {
        key: 'greeting',
        language: 'fr',
        expectedSignature: ['string'],
        actualSignature: [],
        missing: [{ position: 1, type: 'string' }],
        extra: [],
        changed: [],
        severity: 'warning',
      },
    ]);
  });

  it('exits 2 in strict mode when a plural category is missing', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await runValidate({
      input: ['*.lexi.json'],
      strict: true,
      cwd: workspace.root,
    });

    expect(result.files.map((file) => file.file)).toEqual(['ok.lexi.json', 'placeholder.lexi.json', 'plural.lexi.json']);
    expect(result.exitCode).toBe(EXIT_CODES.PLURAL_VALIDATION);
  });

  it('exits 1 in strict mode for placeholder mismatches alone', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await runValidate({ input: ['placeholder.lexi.json'], strict: true, cwd: workspace.root });
    expect(result.exitCode).toBe(EXIT_CODES.ERROR);
  });

  it('skips disabled checks', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await runValidate({
      input: ['plural.lexi.json', 'placeholder.lexi.json'],
      plurals: false,
      placeholders: false,
      strict: true,
      cwd: workspace.root,
    });

    expect(result.files).toEqual([{ file: 'plural.lexi.json' }, { file: 'placeholder.lexi.json' }]);
    expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
  });

  it('keeps validating after an unreadable file and fails the run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await workspace.write('broken.lexi.json', '{ "entries": ');

    const result = await runValidate({ input: ['broken.lexi.json', 'ok.lexi.json'], cwd: workspace.root });

    expect(result.files[0].error).toMatch(/^Invalid JSON: /);
    expect(result.files[1].plurals?.valid).toBe(true);
    expect(result.exitCode).toBe(EXIT_CODES.ERROR);
  });

  it('prints a single JSON document with --json', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runValidate({ input: ['plural.lexi.json'], json: true, cwd: workspace.root });

    expect(log).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(log.mock.calls[0][0]));
    expect(payload.strict).toBe(false);
    expect(payload.exitCode).toBe(0);
    expect(payload.files[0].plurals.issues[0].missingCategories).toEqual(['one']);
  });
});

describe('validationExitCode', () => {
  const pluralFailure: FileValidation = {
    file: 'a',
    plurals: { mode: 'permissive', valid: false, checked: 1, issues: [], shapeMismatches: [] },
  };
  const readFailure: FileValidation = { file: 'b', error: 'Input file not found: b' };

  it('ranks plural failures above read failures in strict mode', () => {
    expect(validationExitCode([readFailure, pluralFailure], true)).toBe(EXIT_CODES.PLURAL_VALIDATION);
    expect(validationExitCode([readFailure, pluralFailure], false)).toBe(EXIT_CODES.ERROR);
    expect(validationExitCode([pluralFailure], false)).toBe(EXIT_CODES.SUCCESS);
  });
});
