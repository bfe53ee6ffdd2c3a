/**
 * Configuration module for lexiforge
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type {
  MergeConfig,
  SyncConfig,
  PluralsConfig,
  PlaceholdersConfig,
  LexiforgeConfig,
  LoadConfigResult,
} from './types.js';

export {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_SOURCE_LANGUAGE,
  DEFAULT_STRICT,
  DEFAULT_MERGE_STRATEGY,
  DEFAULT_PLACEHOLDER_STYLE,
} from './defaults.js';

export {
  isRecord,
  ensureStringArray,
  normalizeOptionalString,
  normalizeBoolean,
  normalizeSyncConfig,
  normalizePluralsConfig,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, assertConfigValid, isSafeLanguageTag } from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { findUp, loadConfig, loadConfigWithMeta, resolvePluralRules } from './loader.js';
