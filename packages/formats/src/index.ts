export { AnomalyCollector } from './anomalies.js';
export { inferLanguageFromPath } from './language-path.js';
export { stringsFormat, escapeStrings } from './strings.js';
export { androidFormat, escapeAndroid, unescapeAndroid, XML_ATTRIBUTE_PREFIX } from './android.js';
export {
  xcstringsFormat,
  EXTRACTION_STATE_KEY,
  COMMENT_AUTO_GENERATED_KEY,
  IMPLICIT_SOURCE_KEY,
} from './xcstrings.js';
export { csvFormat, tsvFormat, escapeField, parseRecords } from './delimited.js';
export { lexiFormat, LEXI_DOCUMENT_VERSION } from './lexi-json.js';
export { BUILTIN_FORMATS, createDefaultRegistry } from './registry.js';
