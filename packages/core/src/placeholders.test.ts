import { describe, it, expect } from 'vitest';
import {
  compareSignatures,
  describePlaceholderIssue,
  extractPlaceholders,
  fixPlaceholders,
  normalizePlaceholders,
  placeholderSignature,
  PlaceholderValidator,
  validatePlaceholders,
} from './placeholders.js';
import { PlaceholderValidationError } from './errors.js';
import { createEntry, createResource, findEntry, plural, singular } from './model.js';

describe('extractPlaceholders', () => {
  it('reads both token grammars with flags, width and precision', () => {
    const tokens = extractPlaceholders('%1$@ has %ld of %2$s at %.2f%% and %05d');
    expect(tokens.map((token) => [token.raw, token.position, token.type])).toEqual([
      ['%1$@', 1, 'string'],
      ['%ld', 2, 'integer'],
      ['%2$s', 2, 'string'],
      ['%.2f', 3, 'float'],
      ['%05d', 4, 'integer'],
    ]);
  });

  it('ignores literal percents and prose', () => {
    expect(extractPlaceholders('100%% sure, 50% done')).toEqual([]);
  });
});

describe('placeholderSignature', () => {
  it('maps ordinals to types regardless of syntax', () => {
    expect(placeholderSignature('Hello %1$@, you have %d items')).toEqual(['string', 'integer']);
    expect(placeholderSignature('Hello %1$s, you have %ld items')).toEqual(['string', 'integer']);
    expect(placeholderSignature('%2$lu then %1$@')).toEqual(['string', 'unsigned']);
    expect(placeholderSignature('only %3$d')).toEqual([null, null, 'integer']);
  });

  it('ignores positions it cannot index', () => {
    expect(placeholderSignature('%99999999$s and %1$d')).toEqual(['integer']);
    expect(placeholderSignature('%0$s')).toEqual([]);
    expect(extractPlaceholders('%100$@').map((token) => token.raw)).toEqual([]);
  });
});

describe('PlaceholderValidator', () => {
  it('reports the missing integer placeholder', () => {
    const validator = new PlaceholderValidator();
    expect(validator.compare('Hello %1$@, you have %d items', 'Bonjour %1$@')).toEqual({
      missing: [{ position: 2, type: 'integer' }],
      extra: [],
      changed: [],
      valid: false,
    });
  });

  it('reports extra and changed slots', () => {
    expect(compareSignatures(['string'], ['integer', 'float'])).toEqual({
      missing: [],
      extra: [{ position: 2, type: 'float' }],
      changed: [{ position: 1, expected: 'string', actual: 'integer' }],
      valid: false,
    });
  });
});

describe('validatePlaceholders', () => {
  const resource = createResource([
    createEntry({ key: 'greeting', language: 'en', value: singular('Hello %1$@, you have %d items') }),
    createEntry({ key: 'greeting', language: 'fr', value: singular('Bonjour %1$@') }),
    createEntry({ key: 'greeting', language: 'de', value: singular('Hallo %1$s, du hast %ld Dinge') }),
    createEntry({ key: 'files', language: 'en', value: plural({ one: 'One file', other: '%d files' }) }),
    createEntry({ key: 'files', language: 'pl', value: plural({ one: '1 plik', few: '%d pliki', many: '%@ plików' }) }),
  ]);

  it('reports mismatches per key and language', () => {
    const report = validatePlaceholders(resource);
    expect(report.sourceLanguage).toBe('en');
    expect(report.checked).toBe(5);
    expect(report.issues).toEqual([
      {
        key: 'files',
        language: 'pl',
        category: 'many',
        expectedSignature: ['integer'],
        actualSignature: ['string'],
        missing: [],
        extra: [],
        changed: [{ position: 1, expected: 'integer', actual: 'string' }],
        severity: 'warning',
      },
      {
        key: 'greeting',
        language: 'fr',
        expectedSignature: ['string', 'integer'],
        actualSignature: ['string'],
        missing: [{ position: 2, type: 'integer' }],
        extra: [],
        changed: [],
        severity: 'warning',
      },
    ]);
    expect(describePlaceholderIssue(report.issues[1])).toBe('missing integer at 2');
  });

  it('throws in strict mode', () => {
    expect(() => validatePlaceholders(resource, { mode: 'strict' })).toThrow(PlaceholderValidationError);
  });
});

describe('normalizePlaceholders', () => {
  it('re-encodes to the apple style', () => {
    expect(normalizePlaceholders('Hi %1$s, %d new, %u left, %.1f%%', 'apple')).toBe('Hi %1$@, %ld new, %lu left, %.1f%%');
  });

  it('re-encodes to the android style', () => {
    expect(normalizePlaceholders('Hi %1$@, %ld new, %lu left', 'android')).toBe('Hi %1$s, %d new, %u left');
  });

  it('leaves text without placeholders alone', () => {
    expect(normalizePlaceholders('50% done', 'apple')).toBe('50% done');
  });
});

describe('fixPlaceholders', () => {
  it('rewrites only translations whose signature matches the source', () => {
    const resource = createResource([
      createEntry({ key: 'greeting', language: 'en', value: singular('Hello %1$s, you have %d items') }),
      createEntry({ key: 'greeting', language: 'de', value: singular('Hallo %1$s, du hast %d Dinge') }),
      createEntry({ key: 'greeting', language: 'fr', value: singular('Bonjour %1$s') }),
    ]);

    const result = fixPlaceholders(resource, { style: 'apple' });

    expect(findEntry(result.resource, 'greeting', 'en')?.value).toEqual(singular('Hello %1$@, you have %ld items'));
    expect(findEntry(result.resource, 'greeting', 'de')?.value).toEqual(singular('Hallo %1$@, du hast %ld Dinge'));
    expect(findEntry(result.resource, 'greeting', 'fr')?.value).toEqual(singular('Bonjour %1$s'));
    expect(result.fixed.map((fix) => fix.language)).toEqual(['en', 'de']);
    expect(result.skipped.map((issue) => `${issue.key}/${issue.language}`)).toEqual(['greeting/fr']);
    expect(findEntry(resource, 'greeting', 'en')?.value).toEqual(singular('Hello %1$s, you have %d items'));
  });
});
