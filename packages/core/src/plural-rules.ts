/**
 * Lookup of the plural categories each language requires.
 *
 * The table is data, not linguistics: the shipped defaults live in
 * `data/plural-categories.json` and can be extended or overridden per project.
 */

import { readFileSync } from 'fs';
import fs from 'fs/promises';
import type { PluralCategory } from './model.js';
import { PLURAL_CATEGORIES, baseLanguage, normalizeLanguage, parsePluralCategory } from './model.js';

export interface PluralRuleGroup {
  categories: string[];
  languages: string[];
}

export interface PluralRuleData {
  fallback?: string[];
  groups?: PluralRuleGroup[];
  /** Per-language entries; these win over `groups` */
  languages?: Record<string, string[]>;
}

const DEFAULT_RULES_URL = new URL('../data/plural-categories.json', import.meta.url);

export class PluralRuleTable {
  constructor(
    private readonly rules: ReadonlyMap<string, readonly PluralCategory[]>,
    public readonly fallback: readonly PluralCategory[] = ['other']
  ) {}

  /**
   * Full tag first (`pt-br`), then the base language (`pt`), then the fallback.
   */
  public requiredCategories(language: string): PluralCategory[] {
    const normalized = normalizeLanguage(language);
    const found = this.rules.get(normalized) ?? this.rules.get(baseLanguage(normalized));
    return [...(found ?? this.fallback)];
  }

  public has(language: string): boolean {
    const normalized = normalizeLanguage(language);
    return this.rules.has(normalized) || this.rules.has(baseLanguage(normalized));
  }

  public languages(): string[] {
    return Array.from(this.rules.keys()).sort();
  }

  /**
   * New table with per-language overrides applied on top of this one.
   */
  public extend(overrides: Record<string, string[]>): PluralRuleTable {
    const merged = new Map(this.rules);
    for (const [language, categories] of Object.entries(overrides)) {
      merged.set(normalizeLanguage(language), toCategories(categories, `language "${language}"`));
    }
    return new PluralRuleTable(merged, this.fallback);
  }
}

function toCategories(values: string[], origin: string): PluralCategory[] {
  const categories = new Set<PluralCategory>();
  for (const value of values) {
    const category = parsePluralCategory(value);
    if (!category) {
      throw new Error(
        `Unknown plural category "${value}" for ${origin}. Expected one of: ${PLURAL_CATEGORIES.join(', ')}`
      );
    }
    categories.add(category);
  }
  return PLURAL_CATEGORIES.filter((category) => categories.has(category));
}

export function createPluralRuleTable(data: PluralRuleData): PluralRuleTable {
  const rules = new Map<string, PluralCategory[]>();
  (data.groups ?? []).forEach((group, index) => {
    const categories = toCategories(group.categories, `group ${index}`);
    for (const language of group.languages) {
      rules.set(normalizeLanguage(language), categories);
    }
  });
  for (const [language, categories] of Object.entries(data.languages ?? {})) {
    rules.set(normalizeLanguage(language), toCategories(categories, `language "${language}"`));
  }
  const fallback = data.fallback?.length ? toCategories(data.fallback, 'fallback') : ['other' as const];
  return new PluralRuleTable(rules, fallback);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate the shape of rule data read from JSON.
 */
export function parsePluralRuleData(raw: unknown, origin: string): PluralRuleData {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`Plural rules in ${origin} must be a JSON object`);
  }
  const data: PluralRuleData = {};
  const fallback: unknown = Reflect.get(raw, 'fallback');
  if (fallback !== undefined) {
    if (!isStringArray(fallback)) {
      throw new Error(`"fallback" in ${origin} must be an array of category names`);
    }
    data.fallback = fallback;
  }
  const groups: unknown = Reflect.get(raw, 'groups');
  if (groups !== undefined) {
    if (!Array.isArray(groups)) {
      throw new Error(`"groups" in ${origin} must be an array`);
    }
    data.groups = groups.map((group: unknown, index) => {
      const categories: unknown = group && typeof group === 'object' ? Reflect.get(group, 'categories') : undefined;
      const languages: unknown = group && typeof group === 'object' ? Reflect.get(group, 'languages') : undefined;
      if (!isStringArray(categories) || !isStringArray(languages)) {
        throw new Error(`Group ${index} in ${origin} needs "categories" and "languages" string arrays`);
      }
      return { categories, languages };
    });
  }
  const languages: unknown = Reflect.get(raw, 'languages');
  if (languages !== undefined) {
    if (!languages || typeof languages !== 'object' || Array.isArray(languages)) {
      throw new Error(`"languages" in ${origin} must map language tags to category arrays`);
    }
    const mapped: Record<string, string[]> = {};
    for (const [language, categories] of Object.entries(languages)) {
      if (!isStringArray(categories)) {
        throw new Error(`Categories for "${language}" in ${origin} must be an array of strings`);
      }
      mapped[language] = categories;
    }
    data.languages = mapped;
  }
  return data;
}

let defaultTable: PluralRuleTable | undefined;

/**
 * The shipped CLDR-derived table, read once per process.
 */
export function loadDefaultPluralRules(): PluralRuleTable {
  if (!defaultTable) {
    const contents = readFileSync(DEFAULT_RULES_URL, 'utf8');
    defaultTable = createPluralRuleTable(parsePluralRuleData(JSON.parse(contents), 'the default plural table'));
  }
  return defaultTable;
}

/**
 * Read a project rules file. Its entries extend the default table unless
 * `replace` is set.
 */
export async function loadPluralRulesFile(filePath: string, options: { replace?: boolean } = {}): Promise<PluralRuleTable> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read plural rules at ${filePath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Plural rules at ${filePath} contain invalid JSON: ${message}`);
  }

  const data = parsePluralRuleData(raw, filePath);
  if (options.replace) {
    return createPluralRuleTable(data);
  }
  const overrides: Record<string, string[]> = {};
  for (const group of data.groups ?? []) {
    for (const language of group.languages) {
      overrides[language] = group.categories;
    }
  }
  Object.assign(overrides, data.languages ?? {});
  return loadDefaultPluralRules().extend(overrides);
}
