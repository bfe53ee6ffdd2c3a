/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import { isMergeStrategy } from '../merge.js';
import { isPlaceholderStyle } from '../placeholders.js';
import type { LexiforgeConfig, PluralsConfig, SyncConfig } from './types.js';
import {
  DEFAULT_MERGE_STRATEGY,
  DEFAULT_PLACEHOLDER_STYLE,
  DEFAULT_SOURCE_LANGUAGE,
  DEFAULT_STRICT,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

// ─────────────────────────────────────────────────────────────────────────────
// Section Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeSyncConfig(input: unknown): SyncConfig {
  const raw = isRecord(input) ? input : {};
  const sync: SyncConfig = {
    failOnUnmatched: normalizeBoolean(raw.failOnUnmatched, false),
    failOnAmbiguous: normalizeBoolean(raw.failOnAmbiguous, false),
    recordProvenance: normalizeBoolean(raw.recordProvenance, false),
  };
  const matchLanguage = normalizeOptionalString(raw.matchLanguage);
  if (matchLanguage) {
    sync.matchLanguage = matchLanguage;
  }
  return sync;
}

/**
 * Category lists are kept as written; unknown names are reported by the
 * validator rather than dropped here.
 */
export function normalizePluralsConfig(input: unknown): PluralsConfig {
  const raw = isRecord(input) ? input : {};
  const rules: Record<string, string[]> = {};
  if (isRecord(raw.rules)) {
    for (const [language, categories] of Object.entries(raw.rules)) {
      const list = ensureStringArray(categories).map((category) => category.toLowerCase());
      if (list.length) {
        rules[language] = list;
      }
    }
  }
  const plurals: PluralsConfig = { rules };
  const rulesFile = normalizeOptionalString(raw.rulesFile);
  if (rulesFile) {
    plurals.rulesFile = rulesFile;
  }
  return plurals;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Config Normalizer
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Normalize a raw config object into a fully-typed LexiforgeConfig.
 */
export function normalizeConfig(rawConfig: unknown): LexiforgeConfig {
  const raw = isRecord(rawConfig) ? rawConfig : {};
  const merge = isRecord(raw.merge) ? raw.merge : {};
  const placeholders = isRecord(raw.placeholders) ? raw.placeholders : {};

  return {
    sourceLanguage: normalizeOptionalString(raw.sourceLanguage) ?? DEFAULT_SOURCE_LANGUAGE,
    strict: normalizeBoolean(raw.strict, DEFAULT_STRICT),
    merge: {
      strategy: isMergeStrategy(merge.strategy) ? merge.strategy : DEFAULT_MERGE_STRATEGY,
    },
    sync: normalizeSyncConfig(raw.sync),
    plurals: normalizePluralsConfig(raw.plurals),
    placeholders: {
      style: isPlaceholderStyle(placeholders.style) ? placeholders.style : DEFAULT_PLACEHOLDER_STYLE,
    },
  };
}
