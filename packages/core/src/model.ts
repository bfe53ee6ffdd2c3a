/**
 * Canonical in-memory representation of translatable content.
 *
 * Every format adapter parses into this model and serializes out of it, and
 * the merge, diff, sync and validation engines operate on it exclusively.
 * Resources are treated as immutable snapshots: helpers return new objects
 * and never share plural-form or custom maps between resources.
 */

import { DuplicateEntryError } from './errors.js';

export const PLURAL_CATEGORIES = ['zero', 'one', 'two', 'few', 'many', 'other'] as const;
export type PluralCategory = (typeof PLURAL_CATEGORIES)[number];

export const ENTRY_STATUSES = ['new', 'translated', 'needs_review', 'stale', 'do_not_translate'] as const;
export type EntryStatus = (typeof ENTRY_STATUSES)[number];

export type PluralForms = Partial<Record<PluralCategory, string>>;

export interface SingularTranslation {
  kind: 'singular';
  value: string;
}

export interface PluralTranslation {
  kind: 'plural';
  /** Only the categories the source supplied; an absent category is not an empty string */
  forms: PluralForms;
}

export type Translation = SingularTranslation | PluralTranslation;

export interface Entry {
  key: string;
  language: string;
  value: Translation;
  status: EntryStatus;
  comment?: string;
  /** Format-specific extension data, in insertion order */
  custom: Record<string, string>;
}

export interface Resource {
  metadata: Record<string, string>;
  entries: Entry[];
}

export interface EntryInit {
  key: string;
  language: string;
  value: Translation;
  status?: EntryStatus;
  comment?: string;
  custom?: Record<string, string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Translations
// ─────────────────────────────────────────────────────────────────────────────

export function singular(value: string): SingularTranslation {
  return { kind: 'singular', value };
}

export function plural(forms: PluralForms): PluralTranslation {
  const copy: PluralForms = {};
  for (const category of PLURAL_CATEGORIES) {
    const form = forms[category];
    if (form !== undefined) {
      copy[category] = form;
    }
  }
  return { kind: 'plural', forms: copy };
}

export function cloneTranslation(translation: Translation): Translation {
  return translation.kind === 'singular' ? singular(translation.value) : plural(translation.forms);
}

export const isPluralCategory = (value: string): value is PluralCategory =>
  (PLURAL_CATEGORIES as readonly string[]).includes(value);

export function parsePluralCategory(value: string): PluralCategory | undefined {
  const normalized = value.trim().toLowerCase();
  return isPluralCategory(normalized) ? normalized : undefined;
}

/**
 * Populated categories of a plural translation in canonical order.
 */
export function orderedCategories(forms: PluralForms): PluralCategory[] {
  return PLURAL_CATEGORIES.filter((category) => forms[category] !== undefined);
}

export function translationsEqual(a: Translation, b: Translation): boolean {
  if (a.kind === 'singular' || b.kind === 'singular') {
    return a.kind === 'singular' && b.kind === 'singular' && a.value === b.value;
  }
  return PLURAL_CATEGORIES.every((category) => a.forms[category] === b.forms[category]);
}

export function isTranslationEmpty(translation: Translation): boolean {
  if (translation.kind === 'singular') {
    return translation.value.length === 0;
  }
  return orderedCategories(translation.forms).every((category) => !translation.forms[category]);
}

/**
 * Single-line rendering used in reports and conflict messages.
 */
export function formatTranslation(translation: Translation): string {
  if (translation.kind === 'singular') {
    return translation.value;
  }
  return orderedCategories(translation.forms)
    .map((category) => `${category}: ${translation.forms[category] ?? ''}`)
    .join(' | ');
}

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

export const isEntryStatus = (value: string): value is EntryStatus =>
  (ENTRY_STATUSES as readonly string[]).includes(value);

/**
 * Accepts snake_case, kebab-case, camelCase and PascalCase spellings.
 */
export function parseEntryStatus(value: string): EntryStatus | undefined {
  const normalized = value
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
  return isEntryStatus(normalized) ? normalized : undefined;
}

export function defaultStatusFor(translation: Translation): EntryStatus {
  return isTranslationEmpty(translation) ? 'new' : 'translated';
}

// ─────────────────────────────────────────────────────────────────────────────
// Languages
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeLanguage(language: string): string {
  return language.trim().replace(/_/g, '-').toLowerCase();
}

export function baseLanguage(language: string): string {
  return normalizeLanguage(language).split('-')[0] ?? '';
}

/**
 * Exact match after normalization, or a match on the base language
 * (`fr` matches `fr-CA`).
 */
export function languagesMatch(a: string, b: string): boolean {
  const left = normalizeLanguage(a);
  const right = normalizeLanguage(b);
  return left === right || baseLanguage(left) === baseLanguage(right);
}

// ─────────────────────────────────────────────────────────────────────────────
// Entries & Resources
// ─────────────────────────────────────────────────────────────────────────────

export function createEntry(init: EntryInit): Entry {
  const entry: Entry = {
    key: init.key,
    language: init.language,
    value: cloneTranslation(init.value),
    status: init.status ?? defaultStatusFor(init.value),
    custom: { ...(init.custom ?? {}) },
  };
  if (init.comment !== undefined) {
    entry.comment = init.comment;
  }
  return entry;
}

export function cloneEntry(entry: Entry): Entry {
  return createEntry(entry);
}

export function entryId(key: string, language: string): string {
  return `${key}\u0000${normalizeLanguage(language)}`;
}

export function entriesEqual(a: Entry, b: Entry): boolean {
  if (
    a.key !== b.key ||
    normalizeLanguage(a.language) !== normalizeLanguage(b.language) ||
    a.status !== b.status ||
    a.comment !== b.comment ||
    !translationsEqual(a.value, b.value)
  ) {
    return false;
  }
  const customKeys = Object.keys(a.custom);
  return (
    customKeys.length === Object.keys(b.custom).length &&
    customKeys.every((key) => a.custom[key] === b.custom[key])
  );
}

/**
 * Build a resource, copying every entry. Throws DuplicateEntryError when two
 * entries share a (key, language) pair.
 */
export function createResource(entries: Entry[] = [], metadata: Record<string, string> = {}): Resource {
  const seen = new Set<string>();
  const copies: Entry[] = [];
  for (const entry of entries) {
    const id = entryId(entry.key, entry.language);
    if (seen.has(id)) {
      throw new DuplicateEntryError(entry.key, entry.language);
    }
    seen.add(id);
    copies.push(cloneEntry(entry));
  }
  return { metadata: { ...metadata }, entries: copies };
}

export function findEntry(resource: Resource, key: string, language: string): Entry | undefined {
  const normalized = normalizeLanguage(language);
  return resource.entries.find(
    (entry) => entry.key === key && normalizeLanguage(entry.language) === normalized
  );
}

/**
 * Languages in first-seen order, deduplicated after normalization.
 */
export function listLanguages(resource: Resource): string[] {
  const seen = new Set<string>();
  const languages: string[] = [];
  for (const entry of resource.entries) {
    const normalized = normalizeLanguage(entry.language);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      languages.push(entry.language);
    }
  }
  return languages;
}

export function listKeys(resource: Resource, language?: string): string[] {
  const normalized = language === undefined ? undefined : normalizeLanguage(language);
  const keys = new Set<string>();
  for (const entry of resource.entries) {
    if (normalized === undefined || normalizeLanguage(entry.language) === normalized) {
      keys.add(entry.key);
    }
  }
  return Array.from(keys);
}

/**
 * Language the other translations are checked against: explicit choice, then
 * the declared `source_language`, then `en` when present, then the first
 * language seen.
 */
export function inferSourceLanguage(resource: Resource, explicit?: string): string {
  if (explicit?.trim()) {
    return explicit.trim();
  }
  const declared = resource.metadata.source_language;
  if (declared?.trim()) {
    return declared.trim();
  }
  const languages = listLanguages(resource);
  if (languages.some((language) => normalizeLanguage(language) === 'en')) {
    return 'en';
  }
  return languages[0] ?? 'en';
}

export function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Sorted copy ordered by key then language.
 */
export function sortEntries(entries: Entry[]): Entry[] {
  return [...entries].sort(
    (a, b) =>
      compareStrings(a.key, b.key) ||
      compareStrings(normalizeLanguage(a.language), normalizeLanguage(b.language))
  );
}
