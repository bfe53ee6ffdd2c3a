import type { Entry, EntryStatus, Resource, Translation } from './model.js';
import { compareStrings, languagesMatch, normalizeLanguage, translationsEqual } from './model.js';

export interface ChangedEntry {
  key: string;
  before: Translation;
  after: Translation;
  beforeStatus: EntryStatus;
  afterStatus: EntryStatus;
}

export interface LanguageDiff {
  /** Keys present in target but not in source */
  added: string[];
  /** Keys present in source but not in target */
  removed: string[];
  changed: ChangedEntry[];
  unchanged: number;
}

/** Per-language delta keyed by normalized language tag, in sorted order */
export type DiffReport = Record<string, LanguageDiff>;

export interface DiffOptions {
  /** Restrict the report to one language (exact or base-language match) */
  language?: string;
}

export interface DiffSummary {
  languages: number;
  added: number;
  removed: number;
  changed: number;
  unchanged: number;
}

function indexByLanguage(resource: Resource, filter?: string): Map<string, Map<string, Entry>> {
  const index = new Map<string, Map<string, Entry>>();
  for (const entry of resource.entries) {
    if (filter !== undefined && !languagesMatch(entry.language, filter)) {
      continue;
    }
    const language = normalizeLanguage(entry.language);
    let byKey = index.get(language);
    if (!byKey) {
      byKey = new Map();
      index.set(language, byKey);
    }
    byKey.set(entry.key, entry);
  }
  return index;
}

/**
 * Structural delta from `source` to `target`, compared on (key, language).
 * Plural values are equal only when their full category maps are equal;
 * a status change alone counts as a change.
 */
export function diffResources(source: Resource, target: Resource, options: DiffOptions = {}): DiffReport {
  const before = indexByLanguage(source, options.language);
  const after = indexByLanguage(target, options.language);
  const languages = Array.from(new Set([...before.keys(), ...after.keys()])).sort(compareStrings);

  const report: DiffReport = {};
  for (const language of languages) {
    const sourceEntries = before.get(language) ?? new Map<string, Entry>();
    const targetEntries = after.get(language) ?? new Map<string, Entry>();
    const diff: LanguageDiff = { added: [], removed: [], changed: [], unchanged: 0 };

    for (const [key, entry] of targetEntries) {
      const previous = sourceEntries.get(key);
      if (!previous) {
        diff.added.push(key);
      } else if (!translationsEqual(previous.value, entry.value) || previous.status !== entry.status) {
        diff.changed.push({
          key,
          before: previous.value,
          after: entry.value,
          beforeStatus: previous.status,
          afterStatus: entry.status,
        });
      } else {
        diff.unchanged += 1;
      }
    }
    for (const key of sourceEntries.keys()) {
      if (!targetEntries.has(key)) {
        diff.removed.push(key);
      }
    }

    diff.added.sort(compareStrings);
    diff.removed.sort(compareStrings);
    diff.changed.sort((a, b) => compareStrings(a.key, b.key));
    report[language] = diff;
  }

  return report;
}

export function summarizeDiff(report: DiffReport): DiffSummary {
  const summary: DiffSummary = { languages: 0, added: 0, removed: 0, changed: 0, unchanged: 0 };
  for (const diff of Object.values(report)) {
    summary.languages += 1;
    summary.added += diff.added.length;
    summary.removed += diff.removed.length;
    summary.changed += diff.changed.length;
    summary.unchanged += diff.unchanged;
  }
  return summary;
}

export function hasDifferences(report: DiffReport): boolean {
  return Object.values(report).some(
    (diff) => diff.added.length > 0 || diff.removed.length > 0 || diff.changed.length > 0
  );
}
