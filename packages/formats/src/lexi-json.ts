/**
 * Native `.lexi.json` documents. Every part of the model is written out, so
 * converting through this format loses nothing.
 */

import {
  ParseError,
  createEntry,
  decodeSource,
  defaultStatusFor,
  entryId,
  isRecord,
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

const TAG = 'lexi';
export const LEXI_DOCUMENT_VERSION = 1;

interface LexiEntry {
  key: string;
  language: string;
  value: string | Partial<Record<string, string>>;
  status: EntryStatus;
  comment?: string;
  custom?: Record<string, string>;
}

interface LexiDocument {
  version: number;
  metadata: Record<string, string>;
  entries: LexiEntry[];
}

function readStringMap(raw: unknown): Record<string, string> {
  const map: Record<string, string> = {};
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string') {
        map[key] = value;
      }
    }
  }
  return map;
}

function readValue(raw: unknown, key: string, anomalies: AnomalyCollector): Translation | undefined {
  if (typeof raw === 'string') {
    return singular(raw);
  }
  if (!isRecord(raw)) {
    anomalies.report(`Entry "${key}" has no usable value; skipped`, { key });
    return undefined;
  }
  const forms: PluralForms = {};
  for (const [name, form] of Object.entries(raw)) {
    const category = parsePluralCategory(name);
    if (!category || typeof form !== 'string') {
      anomalies.report(`Entry "${key}" has an unusable plural form "${name}"; dropped`, { key });
      continue;
    }
    forms[category] = form;
  }
  if (!orderedCategories(forms).length) {
    anomalies.report(`Entry "${key}" has an empty plural value; skipped`, { key });
    return undefined;
  }
  return plural(forms);
}

function parseLexi(source: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  const anomalies = new AnomalyCollector(TAG, options.strict ?? false);
  let document: unknown;
  try {
    document = JSON.parse(decodeSource(source));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON: ${message}`, TAG, undefined, { cause: error });
  }
  if (!isRecord(document) || !Array.isArray(document.entries)) {
    throw new ParseError('A lexi document must be an object with an "entries" array', TAG);
  }
  if (document.version !== undefined && document.version !== LEXI_DOCUMENT_VERSION) {
    anomalies.report(`Unsupported document version ${String(document.version)}; reading as version ${LEXI_DOCUMENT_VERSION}`);
  }

  const entries: Entry[] = [];
  const seen = new Set<string>();
  document.entries.forEach((raw: unknown, index: number) => {
    if (!isRecord(raw) || typeof raw.key !== 'string' || typeof raw.language !== 'string') {
      anomalies.report(`Entry ${index} needs a string key and language; skipped`);
      return;
    }
    const key = raw.key;
    const language = raw.language;
    const id = entryId(key, language);
    if (seen.has(id)) {
      anomalies.report(`Duplicate entry "${key}" (${language}); keeping the first`, { key });
      return;
    }
    const value = readValue(raw.value, key, anomalies);
    if (!value) {
      return;
    }
    let status = typeof raw.status === 'string' ? parseEntryStatus(raw.status) : undefined;
    if (raw.status !== undefined && !status) {
      anomalies.report(`Entry "${key}" has an unknown status; using the default`, { key });
    }
    status ??= defaultStatusFor(value);
    seen.add(id);
    entries.push(
      createEntry({
        key,
        language,
        value,
        status,
        comment: typeof raw.comment === 'string' ? raw.comment : undefined,
        custom: readStringMap(raw.custom),
      })
    );
  });

  return { resource: { metadata: readStringMap(document.metadata), entries }, warnings: anomalies.warnings };
}

function toLexiEntry(entry: Entry): LexiEntry {
  const value = entry.value.kind === 'singular' ? entry.value.value : { ...entry.value.forms };
  return {
    key: entry.key,
    language: entry.language,
    value,
    status: entry.status,
    ...(entry.comment !== undefined ? { comment: entry.comment } : {}),
    ...(Object.keys(entry.custom).length ? { custom: { ...entry.custom } } : {}),
  };
}

function serializeLexi(resource: Resource): SerializeResult {
  const document: LexiDocument = {
    version: LEXI_DOCUMENT_VERSION,
    metadata: { ...resource.metadata },
    entries: resource.entries.map(toLexiEntry),
  };
  return { output: `${JSON.stringify(document, null, 2)}\n`, warnings: [] };
}

export const lexiFormat: FormatAdapter = {
  tag: TAG,
  description: 'Native lexiforge JSON (multi-language, plurals, lossless)',
  extensions: ['.lexi.json'],
  capabilities: { plurals: true, multiLanguage: true },
  parse: parseLexi,
  serialize: serializeLexi,
};
