import type { EntryStatus, Resource } from './model.js';
import { compareStrings, languagesMatch, normalizeLanguage } from './model.js';
import type { PluralRuleTable } from './plural-rules.js';
import { missingPluralCategories } from './plural-validator.js';

export interface LanguageStats {
  language: string;
  total: number;
  byStatus: Record<EntryStatus, number>;
  /** Percentage of translated entries among those that need translating */
  completion: number;
  pluralEntries: number;
  /** Plural entries missing at least one required category */
  incompletePlurals: number;
  missingCategories: number;
}

export interface ResourceStats {
  languages: LanguageStats[];
  uniqueKeys: number;
  totalEntries: number;
}

function emptyStatusCounts(): Record<EntryStatus, number> {
  return { new: 0, translated: 0, needs_review: 0, stale: 0, do_not_translate: 0 };
}

/**
 * Completion is `translated / (total - do_not_translate)`, rounded to two
 * decimals, and 100 when nothing needs translating.
 */
export function completionPercent(byStatus: Record<EntryStatus, number>, total: number): number {
  const denominator = total - byStatus.do_not_translate;
  if (denominator <= 0) {
    return 100;
  }
  return Math.round((byStatus.translated / denominator) * 10000) / 100;
}

export function computeStats(
  resource: Resource,
  table: PluralRuleTable,
  options: { language?: string } = {}
): ResourceStats {
  const perLanguage = new Map<string, LanguageStats>();
  const keys = new Set<string>();
  let totalEntries = 0;

  for (const entry of resource.entries) {
    if (options.language !== undefined && !languagesMatch(entry.language, options.language)) {
      continue;
    }
    totalEntries += 1;
    keys.add(entry.key);
    const language = normalizeLanguage(entry.language);
    let stats = perLanguage.get(language);
    if (!stats) {
      stats = {
        language: entry.language,
        total: 0,
        byStatus: emptyStatusCounts(),
        completion: 0,
        pluralEntries: 0,
        incompletePlurals: 0,
        missingCategories: 0,
      };
      perLanguage.set(language, stats);
    }
    stats.total += 1;
    stats.byStatus[entry.status] += 1;
    if (entry.value.kind === 'plural') {
      stats.pluralEntries += 1;
      const missing = missingPluralCategories(entry, table);
      if (missing.length) {
        stats.incompletePlurals += 1;
        stats.missingCategories += missing.length;
      }
    }
  }

  const languages = Array.from(perLanguage.entries())
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([, stats]) => ({ ...stats, completion: completionPercent(stats.byStatus, stats.total) }));

  return { languages, uniqueKeys: keys.size, totalEntries };
}
