import { describe, it, expect } from 'vitest';
import { completionPercent, computeStats } from './stats.js';
import { loadDefaultPluralRules } from './plural-rules.js';
import { createEntry, createResource, plural, singular } from './model.js';

describe('computeStats', () => {
  const resource = createResource([
    createEntry({ key: 'a', language: 'fr', value: singular('A'), status: 'translated' }),
    createEntry({ key: 'b', language: 'fr', value: singular(''), status: 'new' }),
    createEntry({ key: 'c', language: 'fr', value: singular('C'), status: 'do_not_translate' }),
    createEntry({ key: 'files', language: 'fr', value: plural({ other: '%d fichiers' }), status: 'needs_review' }),
    createEntry({ key: 'a', language: 'en', value: singular('A') }),
  ]);

  it('counts statuses and completion per language', () => {
    const stats = computeStats(resource, loadDefaultPluralRules());
    expect(stats.uniqueKeys).toBe(4);
    expect(stats.totalEntries).toBe(5);
    expect(stats.languages.map((language) => language.language)).toEqual(['en', 'fr']);

    const fr = stats.languages[1];
    expect(fr.total).toBe(4);
    expect(fr.byStatus).toEqual({ new: 1, translated: 1, needs_review: 1, stale: 0, do_not_translate: 1 });
    expect(fr.completion).toBe(33.33);
    expect(fr.pluralEntries).toBe(1);
    expect(fr.incompletePlurals).toBe(1);
    expect(fr.missingCategories).toBe(1);
    expect(stats.languages[0].completion).toBe(100);
  });

  it('filters by language', () => {
    const stats = computeStats(resource, loadDefaultPluralRules(), { language: 'en' });
    expect(stats.languages).toHaveLength(1);
    expect(stats.uniqueKeys).toBe(1);
  });
});

describe('completionPercent', () => {
  it('is 100 when every entry is excluded', () => {
    expect(completionPercent({ new: 0, translated: 0, needs_review: 0, stale: 0, do_not_translate: 2 }, 2)).toBe(100);
  });
});
