import { describe, it, expect } from 'vitest';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid, validateConfig } from './validator.js';

describe('config validator', () => {
  it('accepts a normalized default config', () => {
    const config = normalizeConfig({});
    expect(() => assertConfigValid(config)).not.toThrow();
  });

  it('rejects invalid language tags', () => {
    const config = normalizeConfig({ sourceLanguage: 'en us' });
    const issues = validateConfig(config);
    expect(issues.some((issue) => issue.field === 'sourceLanguage')).toBe(true);
  });

  it('rejects an invalid match language', () => {
    const config = normalizeConfig({ sync: { matchLanguage: 'en;fr' } });
    expect(() => assertConfigValid(config)).toThrow(/sync\.matchLanguage/);
  });

  it('reports unknown plural categories and a missing "other"', () => {
    const config = normalizeConfig({ plurals: { rules: { pl: ['one', 'few', 'lots'] } } });
    const issues = validateConfig(config);
    expect(issues).toEqual([
      {
        field: 'plurals.rules.pl',
        message: 'unknown plural category lots (expected zero, one, two, few, many, other)',
      },
      { field: 'plurals.rules.pl', message: 'must include "other"' },
    ]);
  });

  it('rejects a rules file path with control characters', () => {
    const config = normalizeConfig({ plurals: { rulesFile: 'rules\u0007.json' } });
    const issues = validateConfig(config);
    expect(issues).toEqual([{ field: 'plurals.rulesFile', message: 'contains control characters' }]);
  });
});
