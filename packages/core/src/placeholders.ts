/**
 * printf-style placeholder extraction, cross-language signature checks and
 * style normalization.
 *
 * Two token grammars are recognised: the Apple flavour (`%@`, `%1$@`, `%ld`,
 * `%lu`) and the Android flavour (`%s`, `%1$s`, `%d`, `%u`). Both reduce to
 * the same signature, an ordinal position mapped to a semantic type, which is
 * what translations are compared on.
 */

import { PlaceholderValidationError } from './errors.js';
import type { Entry, PluralCategory, Resource, Translation } from './model.js';
import {
  cloneEntry,
  compareStrings,
  inferSourceLanguage,
  normalizeLanguage,
  orderedCategories,
  plural,
  singular,
  translationsEqual,
} from './model.js';
import type { ValidationMode } from './plural-validator.js';

export type PlaceholderType = 'string' | 'integer' | 'unsigned' | 'float';
export type PlaceholderStyle = 'apple' | 'android';

export const PLACEHOLDER_STYLES: readonly PlaceholderStyle[] = ['apple', 'android'];

export const isPlaceholderStyle = (value: unknown): value is PlaceholderStyle =>
  value === 'apple' || value === 'android';

export interface PlaceholderToken {
  raw: string;
  /** Offset of the token in the scanned string */
  offset: number;
  /** 1-based ordinal the token fills */
  position: number;
  explicitPosition: boolean;
  flags: string;
  width?: string;
  precision?: string;
  length?: string;
  conversion: string;
  type: PlaceholderType;
}

/** Types by ordinal, index 0 holding position 1; `null` marks an unused ordinal */
export type PlaceholderSignature = Array<PlaceholderType | null>;

export interface PlaceholderSlot {
  position: number;
  type: PlaceholderType;
}

export interface PlaceholderComparisonResult {
  /** Slots the source has and the target lacks */
  missing: PlaceholderSlot[];
  /** Slots the target has and the source lacks */
  extra: PlaceholderSlot[];
  /** Slots both have with different types */
  changed: Array<{ position: number; expected: PlaceholderType; actual: PlaceholderType }>;
  valid: boolean;
}

// Space is not a flag here, so "50% done" stays literal text.
const TOKEN_PATTERN = /%(?:(\d+)\$)?([-+0#']*)(\d+)?(?:\.(\d+))?(hh|h|ll|l|q|z|t|j|L)?([@dDiuUxXoOfFeEgGaAcCsSp])|%%/g;

// Signatures are dense arrays; positions outside 1..MAX_POSITION are read as text.
export const MAX_POSITION = 99;

const CONVERSION_TYPES: Record<string, PlaceholderType> = {
  '@': 'string',
  s: 'string',
  S: 'string',
  c: 'string',
  C: 'string',
  p: 'string',
  d: 'integer',
  D: 'integer',
  i: 'integer',
  u: 'unsigned',
  U: 'unsigned',
  x: 'unsigned',
  X: 'unsigned',
  o: 'unsigned',
  O: 'unsigned',
  f: 'float',
  F: 'float',
  e: 'float',
  E: 'float',
  g: 'float',
  G: 'float',
  a: 'float',
  A: 'float',
};

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Tokens in order of appearance. `%%` is a literal percent and yields nothing.
 * A positional token (`%2$s`) moves the ordinal counter; a plain token takes
 * the ordinal after the previous one. Tokens past `MAX_POSITION` are skipped.
 */
export function extractPlaceholders(value: string): PlaceholderToken[] {
  if (!value || !value.includes('%')) {
    return [];
  }

  const tokens: PlaceholderToken[] = [];
  const regex = new RegExp(TOKEN_PATTERN.source, 'g');
  let counter = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(value)) !== null) {
    const [raw, positionText, flags, width, precision, length, conversion] = match;
    if (raw === '%%' || conversion === undefined) {
      continue;
    }
    const type = CONVERSION_TYPES[conversion];
    if (!type) {
      continue;
    }
    const explicitPosition = positionText !== undefined;
    const position = explicitPosition ? Number(positionText) : counter + 1;
    if (position < 1 || position > MAX_POSITION) {
      continue;
    }
    counter = position;
    const token: PlaceholderToken = {
      raw,
      offset: match.index,
      position,
      explicitPosition,
      flags: flags ?? '',
      conversion,
      type,
    };
    if (width !== undefined) token.width = width;
    if (precision !== undefined) token.precision = precision;
    if (length !== undefined) token.length = length;
    tokens.push(token);
  }

  return tokens;
}

export function placeholderSignature(value: string): PlaceholderSignature {
  const signature: PlaceholderSignature = [];
  for (const token of extractPlaceholders(value)) {
    while (signature.length < token.position) {
      signature.push(null);
    }
    // The first token to claim an ordinal defines its type.
    if (signature[token.position - 1] === null) {
      signature[token.position - 1] = token.type;
    }
  }
  return signature;
}

export function compareSignatures(
  expected: PlaceholderSignature,
  actual: PlaceholderSignature
): PlaceholderComparisonResult {
  const result: PlaceholderComparisonResult = { missing: [], extra: [], changed: [], valid: true };
  const length = Math.max(expected.length, actual.length);
  for (let index = 0; index < length; index += 1) {
    const position = index + 1;
    const want = expected[index] ?? null;
    const got = actual[index] ?? null;
    if (want && !got) {
      result.missing.push({ position, type: want });
    } else if (!want && got) {
      result.extra.push({ position, type: got });
    } else if (want && got && want !== got) {
      result.changed.push({ position, expected: want, actual: got });
    }
  }
  result.valid = !result.missing.length && !result.extra.length && !result.changed.length;
  return result;
}

/**
 * PlaceholderValidator compares the placeholder signatures of a source value
 * and its translations.
 */
export class PlaceholderValidator {
  public extract(value: string): PlaceholderSignature {
    return placeholderSignature(value);
  }

  public compare(sourceValue: string, targetValue: string): PlaceholderComparisonResult {
    return compareSignatures(this.extract(sourceValue), this.extract(targetValue));
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cross-language validation
// ─────────────────────────────────────────────────────────────────────────────

export interface PlaceholderIssue {
  key: string;
  language: string;
  /** Plural category of the translated form, when the entry is plural */
  category?: PluralCategory;
  expectedSignature: PlaceholderSignature;
  actualSignature: PlaceholderSignature;
  missing: PlaceholderSlot[];
  extra: PlaceholderSlot[];
  changed: PlaceholderComparisonResult['changed'];
  severity: 'error' | 'warning';
}

export interface PlaceholderValidationReport {
  mode: ValidationMode;
  sourceLanguage: string;
  valid: boolean;
  checked: number;
  issues: PlaceholderIssue[];
}

export interface PlaceholderValidationOptions {
  sourceLanguage?: string;
  mode?: ValidationMode;
}

interface FormPair {
  category?: PluralCategory;
  source: string;
  target: string;
}

function sourceForm(source: Translation, category?: PluralCategory): string | undefined {
  if (source.kind === 'singular') {
    return source.value;
  }
  const forms = source.forms;
  if (category && forms[category] !== undefined) {
    return forms[category];
  }
  return forms.other ?? forms[orderedCategories(forms)[0] ?? 'other'];
}

/**
 * Strings to compare for one translation: each plural form is checked
 * against the source's form of the same category, falling back to `other`.
 */
function pairForms(source: Translation, target: Translation): FormPair[] {
  if (target.kind === 'singular') {
    const expected = sourceForm(source);
    return expected === undefined ? [] : [{ source: expected, target: target.value }];
  }
  const pairs: FormPair[] = [];
  for (const category of orderedCategories(target.forms)) {
    const expected = sourceForm(source, category);
    const actual = target.forms[category];
    if (expected !== undefined && actual !== undefined) {
      pairs.push({ category, source: expected, target: actual });
    }
  }
  return pairs;
}

function groupByKey(resource: Resource): Map<string, Entry[]> {
  const groups = new Map<string, Entry[]>();
  for (const entry of resource.entries) {
    const group = groups.get(entry.key) ?? [];
    group.push(entry);
    groups.set(entry.key, group);
  }
  return groups;
}

/**
 * Every translation's placeholder signature must equal the source language's
 * for the same key. Strict mode throws PlaceholderValidationError on any
 * mismatch.
 */
export function validatePlaceholders(
  resource: Resource,
  options: PlaceholderValidationOptions = {}
): PlaceholderValidationReport {
  const mode = options.mode ?? 'permissive';
  const sourceLanguage = inferSourceLanguage(resource, options.sourceLanguage);
  const normalizedSource = normalizeLanguage(sourceLanguage);
  const validator = new PlaceholderValidator();
  const issues: PlaceholderIssue[] = [];
  let checked = 0;

  for (const [key, entries] of groupByKey(resource)) {
    const source = entries.find((entry) => normalizeLanguage(entry.language) === normalizedSource);
    if (!source) {
      continue;
    }
    for (const entry of entries) {
      if (entry === source) {
        continue;
      }
      for (const pair of pairForms(source.value, entry.value)) {
        checked += 1;
        const comparison = validator.compare(pair.source, pair.target);
        if (comparison.valid) {
          continue;
        }
        const issue: PlaceholderIssue = {
          key,
          language: entry.language,
          expectedSignature: validator.extract(pair.source),
          actualSignature: validator.extract(pair.target),
          missing: comparison.missing,
          extra: comparison.extra,
          changed: comparison.changed,
          severity: mode === 'strict' ? 'error' : 'warning',
        };
        if (pair.category) {
          issue.category = pair.category;
        }
        issues.push(issue);
      }
    }
  }

  issues.sort(
    (a, b) =>
      compareStrings(a.key, b.key) ||
      compareStrings(normalizeLanguage(a.language), normalizeLanguage(b.language))
  );

  const report: PlaceholderValidationReport = {
    mode,
    sourceLanguage,
    valid: issues.length === 0,
    checked,
    issues,
  };
  if (mode === 'strict' && !report.valid) {
    throw new PlaceholderValidationError(report);
  }
  return report;
}

/**
 * One-line description of a mismatch, e.g. `missing integer at 2`.
 */
export function describePlaceholderIssue(issue: PlaceholderIssue): string {
  const parts: string[] = [];
  issue.missing.forEach((slot) => parts.push(`missing ${slot.type} at ${slot.position}`));
  issue.extra.forEach((slot) => parts.push(`extra ${slot.type} at ${slot.position}`));
  issue.changed.forEach((slot) => parts.push(`${slot.expected} became ${slot.actual} at ${slot.position}`));
  return parts.join(', ');
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

function encodeToken(token: PlaceholderToken, style: PlaceholderStyle): string {
  let conversion = token.conversion;
  let length = token.length ?? '';

  if (style === 'apple') {
    if (conversion === 's' || conversion === 'S') {
      conversion = '@';
    } else if ((conversion === 'd' || conversion === 'i') && !length) {
      conversion = 'd';
      length = 'l';
    } else if (conversion === 'u' && !length) {
      length = 'l';
    }
  } else {
    if (conversion === '@') {
      conversion = 's';
    }
    if ((token.type === 'integer' || token.type === 'unsigned') && (length === 'l' || length === 'll')) {
      length = '';
    }
  }

  const position = token.explicitPosition ? `${token.position}$` : '';
  const precision = token.precision !== undefined ? `.${token.precision}` : '';
  return `%${position}${token.flags}${token.width ?? ''}${precision}${length}${conversion}`;
}

/**
 * Re-encode every placeholder in `value` into the given style. Ordinals and
 * types are preserved, so the signature never changes.
 */
export function normalizePlaceholders(value: string, style: PlaceholderStyle): string {
  const tokens = extractPlaceholders(value);
  if (!tokens.length) {
    return value;
  }
  let output = '';
  let cursor = 0;
  for (const token of tokens) {
    output += value.slice(cursor, token.offset) + encodeToken(token, style);
    cursor = token.offset + token.raw.length;
  }
  return output + value.slice(cursor);
}

function normalizeTranslation(translation: Translation, style: PlaceholderStyle): Translation {
  if (translation.kind === 'singular') {
    return singular(normalizePlaceholders(translation.value, style));
  }
  const forms: Partial<Record<PluralCategory, string>> = {};
  for (const category of orderedCategories(translation.forms)) {
    forms[category] = normalizePlaceholders(translation.forms[category] ?? '', style);
  }
  return plural(forms);
}

export interface PlaceholderFix {
  key: string;
  language: string;
  before: Translation;
  after: Translation;
}

export interface FixPlaceholdersResult {
  resource: Resource;
  fixed: PlaceholderFix[];
  /** Translations left alone because their signature differs from the source */
  skipped: PlaceholderIssue[];
}

/**
 * Re-encode placeholders into one style. Only translations whose signature
 * already matches the source are rewritten; a count or type difference is
 * reported in `skipped` and the entry is left untouched.
 */
export function fixPlaceholders(
  resource: Resource,
  options: { style: PlaceholderStyle; sourceLanguage?: string }
): FixPlaceholdersResult {
  const report = validatePlaceholders(resource, { sourceLanguage: options.sourceLanguage, mode: 'permissive' });
  const mismatched = new Set(report.issues.map((issue) => `${issue.key}\u0000${normalizeLanguage(issue.language)}`));
  const fixed: PlaceholderFix[] = [];

  const entries = resource.entries.map((entry) => {
    if (mismatched.has(`${entry.key}\u0000${normalizeLanguage(entry.language)}`)) {
      return cloneEntry(entry);
    }
    const after = normalizeTranslation(entry.value, options.style);
    const copy = cloneEntry(entry);
    if (!translationsEqual(entry.value, after)) {
      copy.value = after;
      fixed.push({ key: entry.key, language: entry.language, before: entry.value, after });
    }
    return copy;
  });

  return {
    resource: { metadata: { ...resource.metadata }, entries },
    fixed,
    skipped: report.issues,
  };
}
