/**
 * Propagate values from a source resource into an existing target resource.
 *
 * Sync never adds or removes target keys. Each target entry is matched first
 * on its own key, in its language or else the one source language sharing its
 * base. Only when that fails is the fallback consulted: the target key itself,
 * then the entry's sibling in the match language, is looked up among the
 * source's match-language texts.
 */

import type { Entry, Resource } from './model.js';
import {
  baseLanguage,
  cloneEntry,
  cloneTranslation,
  entryId,
  inferSourceLanguage,
  languagesMatch,
  normalizeLanguage,
  translationsEqual,
} from './model.js';

export interface SyncOptions {
  /** Language whose text identifies entries whose keys differ between source and target */
  matchLanguage?: string;
  failOnUnmatched?: boolean;
  failOnAmbiguous?: boolean;
  /** Only sync target entries in these languages (exact or base-language match) */
  languages?: string[];
  /** Record where each updated value came from in the entry's custom map */
  recordProvenance?: boolean;
}

export interface AmbiguousMatch {
  key: string;
  candidates: string[];
}

export interface LanguageSyncReport {
  matched: number;
  updated: number;
  unchanged: number;
  exact: number;
  fallback: number;
  unmatched: string[];
  ambiguous: AmbiguousMatch[];
  /** Single fallback candidate that has no value in this language */
  missingLanguage: string[];
  /** Source and target disagree on singular vs plural */
  typeMismatch: string[];
}

export interface SyncTotals {
  matched: number;
  updated: number;
  unchanged: number;
  unmatched: number;
  ambiguous: number;
  missingLanguage: number;
  typeMismatch: number;
}

export interface SyncReport {
  matchLanguage: string;
  languages: Record<string, LanguageSyncReport>;
  totals: SyncTotals;
}

export interface SyncResult {
  resource: Resource;
  report: SyncReport;
  /** Policy failures; non-empty means the caller must not persist the result */
  violations: string[];
}

export const PROVENANCE_SOURCE_KEY = 'provenance.source_key';
export const PROVENANCE_MATCH = 'provenance.match';

/**
 * Explicit choice, then the source's declared `source_language`, then `en`
 * when the source has it, then the source's first language.
 */
export function inferMatchLanguage(source: Resource, explicit?: string): string {
  return inferSourceLanguage(source, explicit);
}

function emptyLanguageReport(): LanguageSyncReport {
  return {
    matched: 0,
    updated: 0,
    unchanged: 0,
    exact: 0,
    fallback: 0,
    unmatched: [],
    ambiguous: [],
    missingLanguage: [],
    typeMismatch: [],
  };
}

/**
 * Source keys grouped by their singular text in the match language, in
 * source order.
 */
function indexByMatchText(source: Resource, matchLanguage: string): Map<string, string[]> {
  const normalized = normalizeLanguage(matchLanguage);
  const index = new Map<string, string[]>();
  for (const entry of source.entries) {
    if (normalizeLanguage(entry.language) !== normalized || entry.value.kind !== 'singular') {
      continue;
    }
    const keys = index.get(entry.value.value) ?? [];
    if (!keys.includes(entry.key)) {
      keys.push(entry.key);
    }
    index.set(entry.value.value, keys);
  }
  return index;
}

type MatchOutcome =
  | { kind: 'matched'; entry: Entry; via: 'exact' | 'fallback' }
  | { kind: 'unmatched' }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'missingLanguage'; candidate: string };

export function syncResources(source: Resource, target: Resource, options: SyncOptions = {}): SyncResult {
  const matchLanguage = inferMatchLanguage(source, options.matchLanguage);
  const sourceByKey = new Map<string, Entry[]>();
  for (const entry of source.entries) {
    const group = sourceByKey.get(entry.key) ?? [];
    group.push(entry);
    sourceByKey.set(entry.key, group);
  }
  const targetIndex = new Map<string, Entry>();
  for (const entry of target.entries) {
    targetIndex.set(entryId(entry.key, entry.language), entry);
  }
  const byMatchText = indexByMatchText(source, matchLanguage);

  // Exact language first, then the only source language sharing its base (`fr` for `fr-CA`).
  const sourceValue = (key: string, language: string): Entry | undefined => {
    const group = sourceByKey.get(key) ?? [];
    const normalized = normalizeLanguage(language);
    const exact = group.find((candidate) => normalizeLanguage(candidate.language) === normalized);
    if (exact) {
      return exact;
    }
    const base = baseLanguage(normalized);
    const sameBase = group.filter((candidate) => baseLanguage(candidate.language) === base);
    return sameBase.length === 1 ? sameBase[0] : undefined;
  };

  // Undefined when no source entry carries `text` in the match language.
  const resolveAlias = (text: string, language: string): MatchOutcome | undefined => {
    const candidates = byMatchText.get(text);
    if (!candidates?.length) {
      return undefined;
    }
    if (candidates.length === 1) {
      const [candidate] = candidates;
      const found = sourceValue(candidate, language);
      return found ? { kind: 'matched', entry: found, via: 'fallback' } : { kind: 'missingLanguage', candidate };
    }
    const withLanguage = candidates.filter((key) => sourceValue(key, language) !== undefined);
    if (withLanguage.length === 1) {
      const found = sourceValue(withLanguage[0], language);
      if (found) {
        return { kind: 'matched', entry: found, via: 'fallback' };
      }
    }
    return { kind: 'ambiguous', candidates: withLanguage.length ? withLanguage : candidates };
  };

  const findMatch = (entry: Entry): MatchOutcome => {
    const exact = sourceValue(entry.key, entry.language);
    if (exact) {
      return { kind: 'matched', entry: exact, via: 'exact' };
    }

    const byKey = resolveAlias(entry.key, entry.language);
    if (byKey) {
      return byKey;
    }

    const sibling = targetIndex.get(entryId(entry.key, matchLanguage));
    if (!sibling || sibling.value.kind !== 'singular' || !sibling.value.value) {
      return { kind: 'unmatched' };
    }
    return resolveAlias(sibling.value.value, entry.language) ?? { kind: 'unmatched' };
  };

  const languages: Record<string, LanguageSyncReport> = {};
  const entries: Entry[] = [];

  for (const entry of target.entries) {
    if (options.languages?.length && !options.languages.some((language) => languagesMatch(entry.language, language))) {
      entries.push(cloneEntry(entry));
      continue;
    }

    const language = normalizeLanguage(entry.language);
    const report = (languages[language] ??= emptyLanguageReport());
    const outcome = findMatch(entry);

    if (outcome.kind === 'unmatched') {
      report.unmatched.push(entry.key);
      entries.push(cloneEntry(entry));
      continue;
    }
    if (outcome.kind === 'ambiguous') {
      report.ambiguous.push({ key: entry.key, candidates: outcome.candidates });
      entries.push(cloneEntry(entry));
      continue;
    }
    if (outcome.kind === 'missingLanguage') {
      report.missingLanguage.push(entry.key);
      entries.push(cloneEntry(entry));
      continue;
    }
    if (outcome.entry.value.kind !== entry.value.kind) {
      report.typeMismatch.push(entry.key);
      entries.push(cloneEntry(entry));
      continue;
    }

    report.matched += 1;
    report[outcome.via] += 1;
    if (translationsEqual(outcome.entry.value, entry.value)) {
      report.unchanged += 1;
      entries.push(cloneEntry(entry));
      continue;
    }

    report.updated += 1;
    const updated = cloneEntry(entry);
    updated.value = cloneTranslation(outcome.entry.value);
    if (options.recordProvenance) {
      updated.custom[PROVENANCE_SOURCE_KEY] = outcome.entry.key;
      updated.custom[PROVENANCE_MATCH] = outcome.via;
    }
    entries.push(updated);
  }

  const totals = summarizeSync(languages);
  const violations: string[] = [];
  if (options.failOnUnmatched && totals.unmatched > 0) {
    violations.push(`${totals.unmatched} unmatched entr${totals.unmatched === 1 ? 'y' : 'ies'}`);
  }
  if (options.failOnAmbiguous && totals.ambiguous > 0) {
    violations.push(`${totals.ambiguous} ambiguous entr${totals.ambiguous === 1 ? 'y' : 'ies'}`);
  }

  return {
    resource: { metadata: { ...target.metadata }, entries },
    report: { matchLanguage, languages: sortReportLanguages(languages), totals },
    violations,
  };
}

function sortReportLanguages(languages: Record<string, LanguageSyncReport>): Record<string, LanguageSyncReport> {
  const sorted: Record<string, LanguageSyncReport> = {};
  for (const language of Object.keys(languages).sort()) {
    sorted[language] = languages[language];
  }
  return sorted;
}

export function summarizeSync(languages: Record<string, LanguageSyncReport>): SyncTotals {
  const totals: SyncTotals = {
    matched: 0,
    updated: 0,
    unchanged: 0,
    unmatched: 0,
    ambiguous: 0,
    missingLanguage: 0,
    typeMismatch: 0,
  };
  for (const report of Object.values(languages)) {
    totals.matched += report.matched;
    totals.updated += report.updated;
    totals.unchanged += report.unchanged;
    totals.unmatched += report.unmatched.length;
    totals.ambiguous += report.ambiguous.length;
    totals.missingLanguage += report.missingLanguage.length;
    totals.typeMismatch += report.typeMismatch.length;
  }
  return totals;
}
