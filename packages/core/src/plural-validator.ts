import { PluralValidationError } from './errors.js';
import type { Entry, PluralCategory, Resource } from './model.js';
import { compareStrings, normalizeLanguage, orderedCategories } from './model.js';
import type { PluralRuleTable } from './plural-rules.js';

export type ValidationMode = 'strict' | 'permissive';

export interface PluralIssue {
  key: string;
  language: string;
  missingCategories: PluralCategory[];
  presentCategories: PluralCategory[];
  severity: 'error' | 'warning';
}

/** A key written as singular in some languages and plural in others */
export interface ShapeMismatch {
  key: string;
  singular: string[];
  plural: string[];
}

export interface PluralValidationReport {
  mode: ValidationMode;
  valid: boolean;
  checked: number;
  issues: PluralIssue[];
  shapeMismatches: ShapeMismatch[];
}

/**
 * Required categories the entry does not populate, in canonical order.
 * Singular entries never miss anything.
 */
export function missingPluralCategories(entry: Entry, table: PluralRuleTable): PluralCategory[] {
  if (entry.value.kind !== 'plural') {
    return [];
  }
  const forms = entry.value.forms;
  return table.requiredCategories(entry.language).filter((category) => forms[category] === undefined);
}

export function findShapeMismatches(resource: Resource): ShapeMismatch[] {
  const shapes = new Map<string, { singular: string[]; plural: string[] }>();
  for (const entry of resource.entries) {
    const shape = shapes.get(entry.key) ?? { singular: [], plural: [] };
    shape[entry.value.kind].push(entry.language);
    shapes.set(entry.key, shape);
  }
  const mismatches: ShapeMismatch[] = [];
  for (const [key, shape] of shapes) {
    if (shape.singular.length && shape.plural.length) {
      mismatches.push({ key, singular: shape.singular, plural: shape.plural });
    }
  }
  return mismatches.sort((a, b) => compareStrings(a.key, b.key));
}

/**
 * Check every plural entry against the rule table. Strict mode throws
 * PluralValidationError when any entry misses a category; permissive mode
 * returns the same findings as warnings.
 */
export function validatePlurals(
  resource: Resource,
  table: PluralRuleTable,
  mode: ValidationMode = 'permissive'
): PluralValidationReport {
  const issues: PluralIssue[] = [];
  let checked = 0;

  for (const entry of resource.entries) {
    if (entry.value.kind !== 'plural') {
      continue;
    }
    checked += 1;
    const missing = missingPluralCategories(entry, table);
    if (missing.length) {
      issues.push({
        key: entry.key,
        language: entry.language,
        missingCategories: missing,
        presentCategories: orderedCategories(entry.value.forms),
        severity: mode === 'strict' ? 'error' : 'warning',
      });
    }
  }

  issues.sort(
    (a, b) =>
      compareStrings(a.key, b.key) ||
      compareStrings(normalizeLanguage(a.language), normalizeLanguage(b.language))
  );

  const report: PluralValidationReport = {
    mode,
    valid: issues.length === 0,
    checked,
    issues,
    shapeMismatches: findShapeMismatches(resource),
  };

  if (mode === 'strict' && !report.valid) {
    throw new PluralValidationError(report);
  }
  return report;
}
