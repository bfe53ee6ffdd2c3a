import { FormatRegistry, type FormatAdapter } from '@lexiforge/core';
import { androidFormat } from './android.js';
import { csvFormat, tsvFormat } from './delimited.js';
import { lexiFormat } from './lexi-json.js';
import { stringsFormat } from './strings.js';
import { xcstringsFormat } from './xcstrings.js';

export const BUILTIN_FORMATS: readonly FormatAdapter[] = [
  stringsFormat,
  androidFormat,
  xcstringsFormat,
  csvFormat,
  tsvFormat,
  lexiFormat,
];

/**
 * A registry holding every built-in adapter. Callers may register more.
 */
export function createDefaultRegistry(): FormatRegistry {
  return new FormatRegistry([...BUILTIN_FORMATS]);
}
