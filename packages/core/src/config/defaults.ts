/**
 * Default configuration values for lexiforge
 */

import type { MergeStrategy } from '../merge.js';
import type { PlaceholderStyle } from '../placeholders.js';

export const DEFAULT_CONFIG_FILENAME = 'lexiforge.config.json';

export const DEFAULT_SOURCE_LANGUAGE = 'en';
export const DEFAULT_STRICT = false;
export const DEFAULT_MERGE_STRATEGY: MergeStrategy = 'last';
export const DEFAULT_PLACEHOLDER_STYLE: PlaceholderStyle = 'apple';
