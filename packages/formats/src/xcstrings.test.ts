import { describe, it, expect } from 'vitest';
import { ParseError } from '@lexiforge/core';
import { xcstringsFormat } from './xcstrings.js';

const CATALOG = {
  sourceLanguage: 'en',
  strings: {
    greeting: {
      comment: 'Shown on launch',
      extractionState: 'manual',
      localizations: {
        en: { stringUnit: { state: 'translated', value: 'Hello' } },
        fr: { stringUnit: { state: 'needs_review', value: 'Bonjour' } },
      },
    },
    apples: {
      localizations: {
        en: {
          variations: {
            plural: {
              one: { stringUnit: { state: 'translated', value: '%lld apple' } },
              other: { stringUnit: { state: 'translated', value: '%lld apples' } },
            },
          },
        },
      },
    },
    OK: {},
    brand: {
      localizations: { en: { stringUnit: { state: 'translated', value: 'Lexi' } } },
      shouldTranslate: false,
    },
  },
  version: '1.0',
};

describe('xcstringsFormat.parse', () => {
  it('reads every language, plural variations and item attributes', () => {
    const { resource, warnings } = xcstringsFormat.parse(JSON.stringify(CATALOG));

    expect(warnings).toEqual([]);
    expect(resource.metadata).toEqual({ source_language: 'en', version: '1.0' });
    expect(resource.entries).toEqual([
      {
        key: 'greeting',
        language: 'en',
        value: { kind: 'singular', value: 'Hello' },
        status: 'translated',
        comment: 'Shown on launch',
        custom: { extraction_state: 'manual' },
      },
      {
        key: 'greeting',
        language: 'fr',
        value: { kind: 'singular', value: 'Bonjour' },
        status: 'needs_review',
        comment: 'Shown on launch',
        custom: { extraction_state: 'manual' },
      },
      {
        key: 'apples',
        language: 'en',
        value: { kind: 'plural', forms: { one: '%lld apple', other: '%lld apples' } },
        status: 'translated',
        custom: {},
      },
      {
        key: 'OK',
        language: 'en',
        value: { kind: 'singular', value: 'OK' },
        status: 'translated',
        custom: { 'xcstrings.implicit_source': 'true' },
      },
      {
        key: 'brand',
        language: 'en',
        value: { kind: 'singular', value: 'Lexi' },
        status: 'do_not_translate',
        custom: {},
      },
    ]);
  });

  it('defaults unknown states and reports them', () => {
    const source = JSON.stringify({
      sourceLanguage: 'en',
      version: '1.0',
      strings: { x: { localizations: { en: { stringUnit: { state: 'reviewed', value: 'X' } } } } },
    });

    const { resource, warnings } = xcstringsFormat.parse(source);
    expect(resource.entries[0].status).toBe('translated');
    expect(warnings).toEqual([{ message: 'Unknown state "reviewed" for "x" (en)', key: 'x' }]);
    expect(() => xcstringsFormat.parse(source, { strict: true })).toThrow(ParseError);
  });

  it('rejects documents that are not catalogs', () => {
    expect(() => xcstringsFormat.parse('{ nope')).toThrow(ParseError);
    expect(() => xcstringsFormat.parse('{"sourceLanguage":"en"}')).toThrow('A string catalog needs a "strings" object');
  });
});

describe('xcstringsFormat.serialize', () => {
  it('writes back the catalog it read', () => {
    const { resource } = xcstringsFormat.parse(JSON.stringify(CATALOG));
    const { output, warnings } = xcstringsFormat.serialize(resource);

    expect(warnings).toEqual([]);
    expect(JSON.parse(output)).toEqual(CATALOG);
    expect(xcstringsFormat.parse(output).resource).toEqual(resource);
  });
});
