/**
 * Configuration types for lexiforge
 */

import type { MergeStrategy } from '../merge.js';
import type { PlaceholderStyle } from '../placeholders.js';

export interface MergeConfig {
  strategy: MergeStrategy;
}

export interface SyncConfig {
  /** Language used to pair entries whose keys differ; inferred when omitted */
  matchLanguage?: string;
  failOnUnmatched: boolean;
  failOnAmbiguous: boolean;
  recordProvenance: boolean;
}

export interface PluralsConfig {
  /** Per-language required categories layered over the shipped table */
  rules: Record<string, string[]>;
  /** JSON rules file, resolved against the config file's directory */
  rulesFile?: string;
}

export interface PlaceholdersConfig {
  style: PlaceholderStyle;
}

export interface LexiforgeConfig {
  sourceLanguage: string;
  /** Fail on recoverable parse/write anomalies and make validation fatal */
  strict: boolean;
  merge: MergeConfig;
  sync: SyncConfig;
  plurals: PluralsConfig;
  placeholders: PlaceholdersConfig;
}

export interface LoadConfigResult {
  config: LexiforgeConfig;
  /** Null when no config file was found and defaults apply */
  configPath: string | null;
  projectRoot: string;
}
