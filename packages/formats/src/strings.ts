/**
 * Apple `.strings` tables: `"key" = "value";` pairs with C-style comments.
 *
 * One language per file. The language comes from the caller or from a
 * `//: Language: xx` header line, which is also what serialization writes.
 * The format has no plurals; see `collapseToSingular` for how they are written.
 */

import {
  collapseToSingular,
  createEntry,
  decodeSource,
  selectLanguageEntries,
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

const TAG = 'strings';
const BARE_KEY = /[A-Za-z0-9_.\-$]/;

function unescapeStrings(raw: string): string {
  let output = '';
  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index];
    if (char !== '\\' || index === raw.length - 1) {
      output += char;
      continue;
    }
    const next = raw[index + 1];
    index += 1;
    switch (next) {
      case 'n':
        output += '\n';
        break;
      case 't':
        output += '\t';
        break;
      case 'r':
        output += '\r';
        break;
      case '0':
        output += '\0';
        break;
      case 'u':
      case 'U': {
        const hex = raw.slice(index + 1, index + 5);
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          output += String.fromCharCode(parseInt(hex, 16));
          index += 4;
        } else {
          output += next;
        }
        break;
      }
      default:
        output += next;
    }
  }
  return output;
}

export function escapeStrings(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

/**
 * Hand-rolled scanner; values may span lines and comments attach to the pair
 * that directly follows them.
 */
class StringsScanner {
  private index = 0;
  private line = 1;
  public readonly header: Record<string, string> = {};

  constructor(private readonly text: string, private readonly anomalies: AnomalyCollector) {}

  public scan(onPair: (key: string, value: string, comment: string | undefined, line: number) => void): void {
    let comment: string | undefined;
    // Adjacent `//` lines form one comment.
    let lineComment = false;

    while (this.index < this.text.length) {
      if (this.skipWhitespace() > 1) {
        comment = undefined;
        lineComment = false;
      }
      if (this.index >= this.text.length) {
        break;
      }

      if (this.text.startsWith('//', this.index)) {
        const body = this.readLine().slice(2);
        if (body.startsWith(':')) {
          const separator = body.indexOf(':', 1);
          if (separator > 0) {
            this.header[body.slice(1, separator).trim()] = body.slice(separator + 1).trim();
          }
          comment = undefined;
          lineComment = false;
        } else {
          comment = lineComment && comment !== undefined ? `${comment}\n${body.trim()}` : body.trim();
          lineComment = true;
        }
        continue;
      }

      if (this.text.startsWith('/*', this.index)) {
        const end = this.text.indexOf('*/', this.index + 2);
        if (end === -1) {
          this.anomalies.report('Unterminated block comment', { line: this.line });
          return;
        }
        const body = this.text.slice(this.index + 2, end);
        this.advanceTo(end + 2);
        comment = body.trim();
        lineComment = false;
        continue;
      }

      const line = this.line;
      const pair = this.readPair();
      if (pair) {
        onPair(pair.key, pair.value, comment || undefined, line);
      }
      comment = undefined;
      lineComment = false;
    }
  }

  /** Returns the number of newlines skipped. */
  private skipWhitespace(): number {
    let newlines = 0;
    while (this.index < this.text.length && /\s/.test(this.text[this.index])) {
      if (this.text[this.index] === '\n') {
        newlines += 1;
        this.line += 1;
      }
      this.index += 1;
    }
    return newlines;
  }

  private readLine(): string {
    const end = this.text.indexOf('\n', this.index);
    const stop = end === -1 ? this.text.length : end;
    const content = this.text.slice(this.index, stop).replace(/\r$/, '');
    this.index = stop;
    return content;
  }

  private advanceTo(position: number): void {
    for (let cursor = this.index; cursor < position; cursor += 1) {
      if (this.text[cursor] === '\n') {
        this.line += 1;
      }
    }
    this.index = position;
  }

  private readQuoted(): string | undefined {
    const start = this.index + 1;
    let cursor = start;
    while (cursor < this.text.length) {
      const char = this.text[cursor];
      if (char === '\\') {
        cursor += 2;
        continue;
      }
      if (char === '"') {
        const raw = this.text.slice(start, cursor);
        this.advanceTo(cursor + 1);
        return unescapeStrings(raw);
      }
      cursor += 1;
    }
    return undefined;
  }

  private readToken(): string | undefined {
    if (this.text[this.index] === '"') {
      return this.readQuoted();
    }
    const start = this.index;
    while (this.index < this.text.length && BARE_KEY.test(this.text[this.index])) {
      this.index += 1;
    }
    return this.index > start ? this.text.slice(start, this.index) : undefined;
  }

  private recover(message: string): undefined {
    this.anomalies.report(message, { line: this.line });
    const end = this.text.indexOf(';', this.index);
    const newline = this.text.indexOf('\n', this.index);
    const stop = end === -1 ? (newline === -1 ? this.text.length : newline) : end + 1;
    this.advanceTo(stop);
    return undefined;
  }

  private readPair(): { key: string; value: string } | undefined {
    const key = this.readToken();
    if (key === undefined) {
      return this.recover(`Expected a key at line ${this.line}`);
    }
    this.skipWhitespace();
    if (this.text[this.index] !== '=') {
      return this.recover(`Expected "=" after "${key}" at line ${this.line}`);
    }
    this.index += 1;
    this.skipWhitespace();
    if (this.text[this.index] !== '"') {
      return this.recover(`Expected a quoted value for "${key}" at line ${this.line}`);
    }
    const value = this.readQuoted();
    if (value === undefined) {
      return this.recover(`Unterminated value for "${key}" at line ${this.line}`);
    }
    const valueLine = this.line;
    this.skipWhitespace();
    if (this.text[this.index] === ';') {
      this.index += 1;
    } else {
      this.anomalies.report(`Missing ";" after "${key}" at line ${valueLine}`, { key, line: valueLine });
    }
    return { key, value };
  }
}

function parseStrings(source: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  const anomalies = new AnomalyCollector(TAG, options.strict ?? false);
  const scanner = new StringsScanner(decodeSource(source), anomalies);
  const pairs: Array<{ key: string; value: string; comment?: string; line: number }> = [];
  const seen = new Set<string>();

  scanner.scan((key, value, comment, line) => {
    if (seen.has(key)) {
      anomalies.report(`Duplicate key "${key}" at line ${line}; keeping the first value`, { key, line });
      return;
    }
    seen.add(key);
    pairs.push({ key, value, comment, line });
  });

  const language = anomalies.resolveLanguage(options, scanner.header.Language);
  const entries: Entry[] = pairs.map((pair) =>
    createEntry({ key: pair.key, language, value: singular(pair.value), comment: pair.comment })
  );
  const resource: Resource = { metadata: { language }, entries };
  return { resource, warnings: anomalies.warnings };
}

function renderComment(comment: string): string {
  if (!comment.includes('*/')) {
    return `/* ${comment} */`;
  }
  return comment
    .split('\n')
    .map((line) => `// ${line}`)
    .join('\n');
}

function serializeStrings(resource: Resource, options: SerializeOptions = {}): SerializeResult {
  const warnings: FormatWarning[] = [];
  const { language, entries } = selectLanguageEntries(resource, TAG, options.language);
  const blocks: string[] = [];

  for (const entry of entries) {
    const value = collapseToSingular(entry, TAG, options.strict ?? false, warnings);
    const pair = `"${escapeStrings(entry.key)}" = "${escapeStrings(value)}";`;
    blocks.push(entry.comment ? `${renderComment(entry.comment)}\n${pair}` : pair);
  }

  const header = language && language !== 'und' ? `//: Language: ${language}\n\n` : '';
  const body = blocks.join('\n\n');
  return { output: `${header}${body}${body ? '\n' : ''}`, warnings };
}

export const stringsFormat: FormatAdapter = {
  tag: TAG,
  description: 'Apple .strings table (single language, no plurals)',
  extensions: ['.strings'],
  capabilities: { plurals: false, multiLanguage: false },
  parse: parseStrings,
  serialize: serializeStrings,
};
