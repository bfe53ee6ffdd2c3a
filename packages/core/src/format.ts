/**
 * Parser contract implemented by every format adapter, and the registry that
 * dispatches on format tags. Nothing in the core branches on a concrete format.
 */

import { UnknownFormatError, WriteError } from './errors.js';
import type { Entry, Resource } from './model.js';
import { formatTranslation, listLanguages, normalizeLanguage, orderedCategories } from './model.js';

export interface FormatWarning {
  message: string;
  key?: string;
  language?: string;
  line?: number;
}

export interface ParseOptions {
  /** Fail on recoverable anomalies instead of recording a warning */
  strict?: boolean;
  /** Language of the file for formats that hold a single language */
  language?: string;
  /** Used when neither `language` nor the file itself names a language */
  defaultLanguage?: string;
}

export interface SerializeOptions {
  strict?: boolean;
  /** Language to emit when the format holds a single language */
  language?: string;
}

export interface ParseResult {
  resource: Resource;
  warnings: FormatWarning[];
}

export interface SerializeResult {
  output: string;
  warnings: FormatWarning[];
}

export interface FormatCapabilities {
  plurals: boolean;
  multiLanguage: boolean;
}

export interface FormatAdapter {
  readonly tag: string;
  readonly description: string;
  /** Lower-case file extensions including the leading dot, e.g. `.strings` */
  readonly extensions: readonly string[];
  readonly capabilities: FormatCapabilities;
  parse(source: string | Uint8Array, options?: ParseOptions): ParseResult;
  serialize(resource: Resource, options?: SerializeOptions): SerializeResult;
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export class FormatRegistry {
  private readonly adapters = new Map<string, FormatAdapter>();

  constructor(adapters: FormatAdapter[] = []) {
    adapters.forEach((adapter) => this.register(adapter));
  }

  public register(adapter: FormatAdapter): this {
    const tag = adapter.tag.toLowerCase();
    if (this.adapters.has(tag)) {
      throw new Error(`A format adapter is already registered for "${tag}"`);
    }
    this.adapters.set(tag, adapter);
    return this;
  }

  public get(tag: string): FormatAdapter | undefined {
    return this.adapters.get(tag.toLowerCase());
  }

  public require(tag: string): FormatAdapter {
    const adapter = this.get(tag);
    if (!adapter) {
      throw new UnknownFormatError(tag, this.tags());
    }
    return adapter;
  }

  /**
   * Pick the adapter whose extension matches the end of the path. The longest
   * extension wins so `.lexi.json` beats `.json`.
   */
  public detect(filePath: string): FormatAdapter | undefined {
    const lower = filePath.toLowerCase();
    let best: { adapter: FormatAdapter; length: number } | undefined;
    for (const adapter of this.adapters.values()) {
      for (const extension of adapter.extensions) {
        if (lower.endsWith(extension) && (!best || extension.length > best.length)) {
          best = { adapter, length: extension.length };
        }
      }
    }
    return best?.adapter;
  }

  /**
   * Explicit tag first, then detection by extension.
   */
  public resolve(filePath: string, tag?: string): FormatAdapter {
    if (tag) {
      return this.require(tag);
    }
    const detected = this.detect(filePath);
    if (!detected) {
      throw new UnknownFormatError(filePath, this.tags());
    }
    return detected;
  }

  public list(): FormatAdapter[] {
    return Array.from(this.adapters.values());
  }

  public tags(): string[] {
    return Array.from(this.adapters.keys());
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers shared by adapters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decode bytes to text, honouring UTF-8 and UTF-16 byte order marks.
 * A leading BOM is stripped from string input too.
 */
export function decodeSource(source: string | Uint8Array): string {
  if (typeof source === 'string') {
    return source.charCodeAt(0) === 0xfeff ? source.slice(1) : source;
  }
  if (source.length >= 2 && source[0] === 0xff && source[1] === 0xfe) {
    return new TextDecoder('utf-16le').decode(source.subarray(2));
  }
  if (source.length >= 2 && source[0] === 0xfe && source[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(source.subarray(2));
  }
  if (source.length >= 3 && source[0] === 0xef && source[1] === 0xbb && source[2] === 0xbf) {
    return new TextDecoder('utf-8').decode(source.subarray(3));
  }
  return new TextDecoder('utf-8').decode(source);
}

/**
 * Entries a single-language format should write. A resource holding one
 * language needs no hint; several languages require `options.language`.
 */
export function selectLanguageEntries(
  resource: Resource,
  format: string,
  language: string | undefined
): { language: string; entries: Entry[] } {
  const languages = listLanguages(resource);
  const chosen = language ?? resource.metadata.language ?? (languages.length === 1 ? languages[0] : undefined);
  if (chosen === undefined) {
    if (!languages.length) {
      return { language: 'und', entries: [] };
    }
    throw new WriteError(
      `The ${format} format holds a single language but the resource has ${languages.length} (${languages.join(', ')}); pass a language`,
      format
    );
  }
  const target = normalizeLanguage(chosen);
  return {
    language: chosen,
    entries: resource.entries.filter((entry) => normalizeLanguage(entry.language) === target),
  };
}

/**
 * Text to write for an entry in a format without plural support. Strict mode
 * refuses to drop categories; permissive mode keeps `other` (or the first
 * populated form) and records what was lost.
 */
export function collapseToSingular(
  entry: Entry,
  format: string,
  strict: boolean,
  warnings: FormatWarning[]
): string {
  if (entry.value.kind === 'singular') {
    return entry.value.value;
  }
  const categories = orderedCategories(entry.value.forms);
  if (strict) {
    throw new WriteError(
      `The ${format} format cannot express plural "${entry.key}" (${entry.language}): ${formatTranslation(entry.value)}`,
      format,
      entry.key
    );
  }
  const kept = entry.value.forms.other !== undefined ? 'other' : categories[0];
  const dropped = categories.filter((category) => category !== kept);
  warnings.push({
    key: entry.key,
    language: entry.language,
    message: `Plural "${entry.key}" written as its "${kept ?? 'other'}" form; dropped ${dropped.length ? dropped.join(', ') : 'no categories'}`,
  });
  return kept === undefined ? '' : entry.value.forms[kept] ?? '';
}
