import { isPluralCategory, PLURAL_CATEGORIES } from '../model.js';
import type { LexiforgeConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const MAX_PATH_LIKE_LENGTH = 320;

export function isSafeLanguageTag(value: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(value);
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeLanguageTag(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

export function validateConfig(config: LexiforgeConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validateLanguage('sourceLanguage', config.sourceLanguage, issues);

  if (config.sync.matchLanguage !== undefined) {
    validateLanguage('sync.matchLanguage', config.sync.matchLanguage, issues);
  }

  for (const [language, categories] of Object.entries(config.plurals.rules)) {
    const field = `plurals.rules.${language}`;
    validateLanguage(field, language, issues);
    const unknown = categories.filter((category) => !isPluralCategory(category));
    if (unknown.length) {
      issues.push({
        field,
        message: `unknown plural categor${unknown.length === 1 ? 'y' : 'ies'} ${unknown.join(', ')} (expected ${PLURAL_CATEGORIES.join(', ')})`,
      });
    }
    if (!categories.includes('other')) {
      issues.push({ field, message: 'must include "other"' });
    }
  }

  if (config.plurals.rulesFile !== undefined) {
    validatePathLike('plurals.rulesFile', config.plurals.rulesFile, issues);
  }

  return issues;
}

export function assertConfigValid(config: LexiforgeConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new Error(`Invalid lexiforge configuration:\n${details}`);
}
