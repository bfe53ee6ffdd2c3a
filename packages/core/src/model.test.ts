import { describe, it, expect } from 'vitest';
import {
  createEntry,
  createResource,
  findEntry,
  formatTranslation,
  inferSourceLanguage,
  languagesMatch,
  listKeys,
  listLanguages,
  normalizeLanguage,
  parseEntryStatus,
  parsePluralCategory,
  plural,
  singular,
  sortEntries,
  translationsEqual,
} from './model.js';
import { DuplicateEntryError } from './errors.js';

describe('resource model', () => {
  it('rejects duplicate (key, language) pairs', () => {
    const entries = [
      createEntry({ key: 'greeting', language: 'en', value: singular('Hello') }),
      createEntry({ key: 'greeting', language: 'EN', value: singular('Hi') }),
    ];
    expect(() => createResource(entries)).toThrow(DuplicateEntryError);
  });

  it('allows the same key in different languages', () => {
    const resource = createResource([
      createEntry({ key: 'greeting', language: 'en', value: singular('Hello') }),
      createEntry({ key: 'greeting', language: 'fr', value: singular('Bonjour') }),
    ]);
    expect(resource.entries).toHaveLength(2);
    expect(findEntry(resource, 'greeting', 'FR')?.value).toEqual(singular('Bonjour'));
  });

  it('copies plural forms instead of sharing them', () => {
    const forms = { one: 'One file', other: '%d files' };
    const entry = createEntry({ key: 'files', language: 'en', value: plural(forms) });
    const resource = createResource([entry]);
    forms.one = 'changed';
    const stored = resource.entries[0].value;
    expect(stored.kind === 'plural' && stored.forms.one).toBe('One file');
    expect(resource.entries[0]).not.toBe(entry);
  });

  it('derives the default status from the value', () => {
    expect(createEntry({ key: 'a', language: 'en', value: singular('') }).status).toBe('new');
    expect(createEntry({ key: 'a', language: 'en', value: singular('x') }).status).toBe('translated');
  });

  it('compares plurals on the full category map', () => {
    expect(translationsEqual(plural({ one: 'a', other: 'b' }), plural({ other: 'b', one: 'a' }))).toBe(true);
    expect(translationsEqual(plural({ one: 'a', other: 'b' }), plural({ other: 'b' }))).toBe(false);
    expect(translationsEqual(singular('b'), plural({ other: 'b' }))).toBe(false);
  });

  it('lists languages and keys in first-seen order', () => {
    const resource = createResource([
      createEntry({ key: 'b', language: 'fr', value: singular('B') }),
      createEntry({ key: 'a', language: 'en', value: singular('A') }),
      createEntry({ key: 'b', language: 'en', value: singular('B') }),
    ]);
    expect(listLanguages(resource)).toEqual(['fr', 'en']);
    expect(listKeys(resource)).toEqual(['b', 'a']);
    expect(listKeys(resource, 'en')).toEqual(['a', 'b']);
    expect(sortEntries(resource.entries).map((entry) => `${entry.key}/${entry.language}`)).toEqual([
      'a/en',
      'b/en',
      'b/fr',
    ]);
  });

  it('normalizes and matches language tags', () => {
    expect(normalizeLanguage(' pt_BR ')).toBe('pt-br');
    expect(languagesMatch('fr', 'fr-CA')).toBe(true);
    expect(languagesMatch('fr', 'de')).toBe(false);
  });

  it('parses status and category spellings', () => {
    expect(parseEntryStatus('needs-review')).toBe('needs_review');
    expect(parseEntryStatus('DoNotTranslate')).toBe('do_not_translate');
    expect(parseEntryStatus('done')).toBeUndefined();
    expect(parsePluralCategory(' Few ')).toBe('few');
    expect(parsePluralCategory('several')).toBeUndefined();
  });

  it('renders translations on one line', () => {
    expect(formatTranslation(plural({ other: '%d files', one: 'One file' }))).toBe('one: One file | other: %d files');
  });

  it('infers the source language', () => {
    const resource = createResource(
      [
        createEntry({ key: 'a', language: 'de', value: singular('A') }),
        createEntry({ key: 'a', language: 'en', value: singular('A') }),
      ],
      {}
    );
    expect(inferSourceLanguage(resource)).toBe('en');
    expect(inferSourceLanguage({ ...resource, metadata: { source_language: 'de' } })).toBe('de');
    expect(inferSourceLanguage(resource, 'fr')).toBe('fr');
    expect(inferSourceLanguage(createResource([createEntry({ key: 'a', language: 'ja', value: singular('A') })]))).toBe('ja');
  });
});
