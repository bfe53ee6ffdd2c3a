import { describe, it, expect } from 'vitest';
import { ensureStringArray, normalizeConfig } from './normalizer.js';

describe('normalizeConfig', () => {
  it('applies defaults to an empty object', () => {
    expect(normalizeConfig({})).toEqual({
      sourceLanguage: 'en',
      strict: false,
      merge: { strategy: 'last' },
      sync: { failOnUnmatched: false, failOnAmbiguous: false, recordProvenance: false },
      plurals: { rules: {} },
      placeholders: { style: 'apple' },
    });
  });

  it('keeps valid values and drops invalid ones', () => {
    const config = normalizeConfig({
      sourceLanguage: ' de ',
      strict: 'yes',
      merge: { strategy: 'error' },
      sync: { matchLanguage: 'en', failOnAmbiguous: true },
      plurals: { rules: { he: 'one, two, many, other', xx: [] }, rulesFile: ' plurals.json ' },
      placeholders: { style: 'fancy' },
    });

    expect(config.sourceLanguage).toBe('de');
    expect(config.strict).toBe(false);
    expect(config.merge.strategy).toBe('error');
    expect(config.sync).toEqual({
      matchLanguage: 'en',
      failOnUnmatched: false,
      failOnAmbiguous: true,
      recordProvenance: false,
    });
    expect(config.plurals).toEqual({ rules: { he: ['one', 'two', 'many', 'other'] }, rulesFile: 'plurals.json' });
    expect(config.placeholders.style).toBe('apple');
  });

  it('treats non-object input as empty', () => {
    expect(normalizeConfig(null).merge.strategy).toBe('last');
    expect(normalizeConfig([1, 2]).sourceLanguage).toBe('en');
  });
});

describe('ensureStringArray', () => {
  it('splits comma-separated strings and filters blanks', () => {
    expect(ensureStringArray('a, b,,c')).toEqual(['a', 'b', 'c']);
    expect(ensureStringArray(['x', '', 3, 'y'])).toEqual(['x', 'y']);
    expect(ensureStringArray(42)).toEqual([]);
  });
});
