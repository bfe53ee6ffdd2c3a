/**
 * CSV and TSV tables.
 *
 * With a header row (`key,en,fr,...`) each column after the first holds one
 * language. Without one, rows are `key,value` pairs in a single language.
 * Empty cells mean "no entry". Plurals are not representable.
 */

import {
  collapseToSingular,
  createEntry,
  decodeSource,
  entryId,
  listLanguages,
  normalizeLanguage,
  singular,
  type Entry,
  type FormatAdapter,
  type FormatWarning,
  type ParseOptions,
  type ParseResult,
  type Resource,
  type SerializeOptions,
  type SerializeResult,
} from '@lexiforge/core';
import { AnomalyCollector } from './anomalies.js';

const KEY_HEADER = 'key';

interface DelimitedRecord {
  fields: string[];
  line: number;
}

/**
 * Escape a field for delimited output
 */
export function escapeField(field: string, delimiter: string): string {
  if (field.includes(delimiter) || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/**
 * Split text into records. Quoted fields may contain the delimiter, doubled
 * quotes and line breaks.
 */
export function parseRecords(text: string, delimiter: string): DelimitedRecord[] {
  const records: DelimitedRecord[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  const endRecord = () => {
    fields.push(current);
    if (fields.length > 1 || fields[0] !== '') {
      records.push({ fields, line: recordLine });
    }
    fields = [];
    current = '';
  };

  while (i < text.length) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
      } else {
        if (char === '\n') line++;
        current += char;
        i++;
      }
      continue;
    }

    if (char === '"' && current === '') {
      inQuotes = true;
      i++;
    } else if (char === delimiter) {
      fields.push(current);
      current = '';
      i++;
    } else if (char === '\n' || char === '\r') {
      endRecord();
      i += char === '\r' && text[i + 1] === '\n' ? 2 : 1;
      line++;
      recordLine = line;
    } else {
      current += char;
      i++;
    }
  }
  if (current !== '' || fields.length) {
    endRecord();
  }
  return records;
}

function isHeader(record: DelimitedRecord | undefined): boolean {
  return record !== undefined && record.fields[0]?.trim().toLowerCase() === KEY_HEADER;
}

function createParser(tag: string, delimiter: string) {
  return (source: string | Uint8Array, options: ParseOptions = {}): ParseResult => {
    const anomalies = new AnomalyCollector(tag, options.strict ?? false);
    const records = parseRecords(decodeSource(source), delimiter);
    const entries: Entry[] = [];
    const seen = new Set<string>();
    const metadata: Record<string, string> = {};

    let columns: Array<string | undefined>;
    let rows: DelimitedRecord[];
    if (isHeader(records[0])) {
      const [header, ...rest] = records;
      columns = header.fields.slice(1).map((cell, index) => {
        const language = cell.trim();
        if (!language) {
          anomalies.report(`Header column ${index + 2} has no language; column ignored`, { line: header.line });
          return undefined;
        }
        return language;
      });
      rows = rest;
    } else {
      const language = anomalies.resolveLanguage(options);
      metadata.language = language;
      columns = [language];
      rows = records;
    }

    for (const row of rows) {
      const [rawKey = '', ...cells] = row.fields;
      const key = rawKey.trim();
      if (!key) {
        anomalies.report(`Row at line ${row.line} has no key; skipped`, { line: row.line });
        continue;
      }
      if (cells.length > columns.length) {
        anomalies.report(`Row "${key}" has ${cells.length - columns.length} extra cell(s); ignored`, {
          key,
          line: row.line,
        });
      }
      columns.forEach((language, index) => {
        const value = cells[index];
        if (language === undefined || value === undefined || value === '') {
          return;
        }
        const id = entryId(key, language);
        if (seen.has(id)) {
          anomalies.report(`Duplicate key "${key}" for ${language} at line ${row.line}; keeping the first value`, {
            key,
            line: row.line,
          });
          return;
        }
        seen.add(id);
        entries.push(createEntry({ key, language, value: singular(value) }));
      });
    }

    const resource: Resource = { metadata, entries };
    return { resource, warnings: anomalies.warnings };
  };
}

function createSerializer(tag: string, delimiter: string) {
  return (resource: Resource, options: SerializeOptions = {}): SerializeResult => {
    const warnings: FormatWarning[] = [];
    const languages = options.language
      ? listLanguages(resource).filter((language) => normalizeLanguage(language) === normalizeLanguage(options.language ?? ''))
      : listLanguages(resource);
    if (options.language && !languages.length) {
      languages.push(options.language);
    }

    const rows = new Map<string, Map<string, string>>();
    const wanted = new Set(languages.map(normalizeLanguage));
    for (const entry of resource.entries) {
      const language = normalizeLanguage(entry.language);
      if (!wanted.has(language)) {
        continue;
      }
      const row = rows.get(entry.key) ?? new Map<string, string>();
      row.set(language, collapseToSingular(entry, tag, options.strict ?? false, warnings));
      rows.set(entry.key, row);
    }

    const escape = (field: string) => escapeField(field, delimiter);
    const lines = [[KEY_HEADER, ...languages].map(escape).join(delimiter)];
    for (const [key, row] of rows) {
      lines.push([key, ...languages.map((language) => row.get(normalizeLanguage(language)) ?? '')].map(escape).join(delimiter));
    }
    return { output: `${lines.join('\n')}\n`, warnings };
  };
}

function createDelimitedFormat(tag: string, delimiter: string, extensions: string[], description: string): FormatAdapter {
  return {
    tag,
    description,
    extensions,
    capabilities: { plurals: false, multiLanguage: true },
    parse: createParser(tag, delimiter),
    serialize: createSerializer(tag, delimiter),
  };
}

export const csvFormat = createDelimitedFormat('csv', ',', ['.csv'], 'Comma-separated table (one column per language, no plurals)');
export const tsvFormat = createDelimitedFormat('tsv', '\t', ['.tsv'], 'Tab-separated table (one column per language, no plurals)');
