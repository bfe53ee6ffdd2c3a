/**
 * Xcode string catalogs (`.xcstrings`): one JSON document holding every
 * language, keyed by string id.
 */

import {
  ParseError,
  createEntry,
  decodeSource,
  defaultStatusFor,
  inferSourceLanguage,
  isRecord,
  normalizeLanguage,
  orderedCategories,
  parseEntryStatus,
  parsePluralCategory,
  plural,
  singular,
  type Entry,
  type EntryStatus,
  type FormatAdapter,
  type ParseOptions,
  type ParseResult,
  type PluralForms,
  type Resource,
  type SerializeResult,
  type Translation,
} from '@lexiforge/core';
import { AnomalyCollector } from './anomalies.js';

const TAG = 'xcstrings';
const DEFAULT_VERSION = '1.0';

export const EXTRACTION_STATE_KEY = 'extraction_state';
export const COMMENT_AUTO_GENERATED_KEY = 'is_comment_auto_generated';
/** Marks a source-language entry whose text is the key itself */
export const IMPLICIT_SOURCE_KEY = 'xcstrings.implicit_source';

type CatalogState = 'new' | 'translated' | 'needs_review' | 'stale';

interface StringUnit {
  state: CatalogState;
  value: string;
}

interface Localization {
  stringUnit?: StringUnit;
  variations?: { plural: Partial<Record<string, { stringUnit: StringUnit }>> };
}

interface CatalogItem {
  comment?: string;
  extractionState?: string;
  isCommentAutoGenerated?: boolean;
  localizations?: Record<string, Localization>;
  shouldTranslate?: boolean;
}

interface Catalog {
  sourceLanguage: string;
  strings: Record<string, CatalogItem>;
  version: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parse
// ─────────────────────────────────────────────────────────────────────────────

function readStringUnit(raw: unknown): { value: string; state?: string } | undefined {
  if (!isRecord(raw) || !isRecord(raw.stringUnit) || typeof raw.stringUnit.value !== 'string') {
    return undefined;
  }
  const state = raw.stringUnit.state;
  return { value: raw.stringUnit.value, state: typeof state === 'string' ? state : undefined };
}

function parseXcstrings(source: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  const anomalies = new AnomalyCollector(TAG, options.strict ?? false);
  let document: unknown;
  try {
    document = JSON.parse(decodeSource(source));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON: ${message}`, TAG, undefined, { cause: error });
  }
  if (!isRecord(document)) {
    throw new ParseError('A string catalog must be a JSON object', TAG);
  }
  if (!isRecord(document.strings)) {
    throw new ParseError('A string catalog needs a "strings" object', TAG);
  }

  let sourceLanguage = typeof document.sourceLanguage === 'string' ? document.sourceLanguage : '';
  if (!sourceLanguage) {
    anomalies.report('Catalog has no sourceLanguage');
    sourceLanguage = options.defaultLanguage ?? options.language ?? 'en';
  }
  const version = typeof document.version === 'string' ? document.version : DEFAULT_VERSION;
  const entries: Entry[] = [];

  for (const [key, item] of Object.entries(document.strings)) {
    if (!isRecord(item)) {
      anomalies.report(`String "${key}" is not an object; skipped`, { key });
      continue;
    }

    const comment = typeof item.comment === 'string' ? item.comment : undefined;
    const doNotTranslate = item.shouldTranslate === false;
    const custom: Record<string, string> = {};
    if (typeof item.extractionState === 'string') {
      custom[EXTRACTION_STATE_KEY] = item.extractionState;
    }
    if (typeof item.isCommentAutoGenerated === 'boolean') {
      custom[COMMENT_AUTO_GENERATED_KEY] = String(item.isCommentAutoGenerated);
    }

    const localizations = isRecord(item.localizations) ? Object.entries(item.localizations) : [];
    if (!localizations.some(([language]) => normalizeLanguage(language) === normalizeLanguage(sourceLanguage))) {
      entries.push(
        createEntry({
          key,
          language: sourceLanguage,
          value: singular(key),
          status: doNotTranslate ? 'do_not_translate' : 'translated',
          comment,
          custom: { ...custom, [IMPLICIT_SOURCE_KEY]: 'true' },
        })
      );
    }

    for (const [language, localization] of localizations) {
      const decoded = readLocalization(localization, key, language, anomalies);
      if (!decoded) {
        continue;
      }
      entries.push(
        createEntry({
          key,
          language,
          value: decoded.value,
          status: doNotTranslate ? 'do_not_translate' : decoded.status,
          comment,
          custom,
        })
      );
    }
  }

  const resource: Resource = { metadata: { source_language: sourceLanguage, version }, entries };
  return { resource, warnings: anomalies.warnings };
}

function readLocalization(
  raw: unknown,
  key: string,
  language: string,
  anomalies: AnomalyCollector
): { value: Translation; status: EntryStatus } | undefined {
  const resolveStatus = (state: string | undefined, value: Translation): EntryStatus => {
    const status = state === undefined ? undefined : parseEntryStatus(state);
    if (state !== undefined && !status) {
      anomalies.report(`Unknown state "${state}" for "${key}" (${language})`, { key });
    }
    return status ?? defaultStatusFor(value);
  };

  const unit = readStringUnit(raw);
  if (unit) {
    const value = singular(unit.value);
    return { value, status: resolveStatus(unit.state, value) };
  }

  const variations = isRecord(raw) && isRecord(raw.variations) ? raw.variations : undefined;
  if (!variations || !isRecord(variations.plural)) {
    anomalies.report(`Localization "${language}" of "${key}" has no string unit or plural variations; skipped`, {
      key,
    });
    return undefined;
  }

  const forms: PluralForms = {};
  let state: string | undefined;
  for (const [quantity, variation] of Object.entries(variations.plural)) {
    const category = parsePluralCategory(quantity);
    const form = readStringUnit(variation);
    if (!category || !form) {
      anomalies.report(`Unusable plural variation "${quantity}" in "${key}" (${language}); skipped`, { key });
      continue;
    }
    forms[category] = form.value;
    state ??= form.state;
  }
  if (!orderedCategories(forms).length) {
    anomalies.report(`Plural variations of "${key}" (${language}) are empty; skipped`, { key });
    return undefined;
  }
  const value = plural(forms);
  return { value, status: resolveStatus(state, value) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialize
// ─────────────────────────────────────────────────────────────────────────────

function catalogState(status: EntryStatus): CatalogState {
  return status === 'do_not_translate' ? 'translated' : status;
}

function toLocalization(entry: Entry): Localization {
  const state = catalogState(entry.status);
  if (entry.value.kind === 'singular') {
    return { stringUnit: { state, value: entry.value.value } };
  }
  const variations: Partial<Record<string, { stringUnit: StringUnit }>> = {};
  for (const category of orderedCategories(entry.value.forms)) {
    variations[category] = { stringUnit: { state, value: entry.value.forms[category] ?? '' } };
  }
  return { variations: { plural: variations } };
}

function isImplicitSource(entry: Entry, sourceLanguage: string): boolean {
  return (
    entry.custom[IMPLICIT_SOURCE_KEY] === 'true' &&
    normalizeLanguage(entry.language) === normalizeLanguage(sourceLanguage) &&
    entry.value.kind === 'singular' &&
    entry.value.value === entry.key
  );
}

function serializeXcstrings(resource: Resource): SerializeResult {
  const sourceLanguage = inferSourceLanguage(resource);
  const strings: Record<string, CatalogItem> = {};

  for (const entry of resource.entries) {
    const item = (strings[entry.key] ??= {});
    if (item.comment === undefined && entry.comment !== undefined) {
      item.comment = entry.comment;
    }
    const extractionState = entry.custom[EXTRACTION_STATE_KEY];
    if (item.extractionState === undefined && extractionState !== undefined) {
      item.extractionState = extractionState;
    }
    const autoGenerated = entry.custom[COMMENT_AUTO_GENERATED_KEY];
    if (item.isCommentAutoGenerated === undefined && autoGenerated !== undefined) {
      item.isCommentAutoGenerated = autoGenerated === 'true';
    }
    if (entry.status === 'do_not_translate') {
      item.shouldTranslate = false;
    }
    if (!isImplicitSource(entry, sourceLanguage)) {
      (item.localizations ??= {})[entry.language] = toLocalization(entry);
    }
  }

  // Field order as Xcode writes it
  const ordered: Record<string, CatalogItem> = {};
  for (const [key, item] of Object.entries(strings)) {
    ordered[key] = {
      ...(item.comment !== undefined ? { comment: item.comment } : {}),
      ...(item.extractionState !== undefined ? { extractionState: item.extractionState } : {}),
      ...(item.isCommentAutoGenerated !== undefined ? { isCommentAutoGenerated: item.isCommentAutoGenerated } : {}),
      ...(item.localizations !== undefined ? { localizations: item.localizations } : {}),
      ...(item.shouldTranslate !== undefined ? { shouldTranslate: item.shouldTranslate } : {}),
    };
  }

  const catalog: Catalog = {
    sourceLanguage,
    strings: ordered,
    version: resource.metadata.version ?? DEFAULT_VERSION,
  };
  return { output: `${JSON.stringify(catalog, null, 2)}\n`, warnings: [] };
}

export const xcstringsFormat: FormatAdapter = {
  tag: TAG,
  description: 'Xcode string catalog (multi-language, plurals)',
  extensions: ['.xcstrings'],
  capabilities: { plurals: true, multiLanguage: true },
  parse: parseXcstrings,
  serialize: serializeXcstrings,
};
