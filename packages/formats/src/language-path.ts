import path from 'path';

const LANGUAGE_PATTERN = /^[a-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/i;
const STEM_LANGUAGE_PATTERN = /^[a-z]{2}(?:[-_][A-Za-z]{2,4})?$/i;

/**
 * Language implied by a resource path: `fr.lproj/Localizable.strings`,
 * `values-pt-rBR/strings.xml`, or a file stem such as `de.csv` or
 * `messages.es.strings`.
 */
export function inferLanguageFromPath(filePath: string): string | undefined {
  const segments = filePath.split(/[\\/]/).filter(Boolean);
  for (const segment of [...segments].reverse()) {
    if (segment.endsWith('.lproj')) {
      const language = segment.slice(0, -'.lproj'.length);
      if (language.toLowerCase() === 'base') {
        return undefined;
      }
      if (LANGUAGE_PATTERN.test(language)) {
        return language;
      }
    }
    if (segment === 'values') {
      return undefined;
    }
    const android = /^values-([a-z]{2,3})(?:-r([A-Za-z]{2}))?$/i.exec(segment);
    if (android) {
      return android[2] ? `${android[1]}-${android[2].toUpperCase()}` : android[1];
    }
  }

  const base = path.basename(filePath);
  const parts = base.split('.');
  // name.lang.ext or lang.ext
  const candidate = parts.length >= 3 ? parts[parts.length - 2] : parts.length === 2 ? parts[0] : undefined;
  return candidate && STEM_LANGUAGE_PATTERN.test(candidate) ? candidate : undefined;
}
