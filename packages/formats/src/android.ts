/**
 * Android `res/values-<qualifier>/strings.xml` resources.
 *
 * `<string>` elements become singular entries and `<plurals>` blocks become
 * plural entries. Inline markup such as `<b>` or `<xliff:g>` is kept verbatim
 * inside the value. Attributes other than `name` and `translatable` survive
 * in the entry's custom map under the `xml.` prefix.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  ParseError,
  createEntry,
  decodeSource,
  orderedCategories,
  parsePluralCategory,
  plural,
  selectLanguageEntries,
  singular,
  type Entry,
  type EntryStatus,
  type FormatAdapter,
  type FormatWarning,
  type ParseOptions,
  type ParseResult,
  type PluralForms,
  type Resource,
  type SerializeOptions,
  type SerializeResult,
} from '@lexiforge/core';
import { AnomalyCollector } from './anomalies.js';

const TAG = 'android';
const ATTRIBUTES = ':@';
const TEXT = '#text';
const COMMENT = '#comment';
const CDATA = '#cdata';
const INDENT = '    ';

export const XML_ATTRIBUTE_PREFIX = 'xml.';

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  commentPropName: COMMENT,
  cdataPropName: CDATA,
});

// ─────────────────────────────────────────────────────────────────────────────
// Node helpers
// ─────────────────────────────────────────────────────────────────────────────

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeName(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES);
}

function nodeChildren(node: XmlNode, name: string): XmlNode[] {
  const children = node[name];
  return Array.isArray(children) ? children.filter(isXmlNode) : [];
}

function nodeAttributes(node: XmlNode): Record<string, string> {
  const raw = node[ATTRIBUTES];
  const attributes: Record<string, string> = {};
  if (isXmlNode(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string') {
        attributes[key] = value;
      }
    }
  }
  return attributes;
}

function textOf(node: XmlNode, name: string): string {
  return nodeChildren(node, name)
    .map((child) => (typeof child[TEXT] === 'string' ? child[TEXT] : ''))
    .join('');
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Rebuild the markup between an element's tags. Text comes back decoded;
 * nested elements are written out literally.
 */
function renderInner(children: XmlNode[]): string {
  let output = '';
  for (const child of children) {
    const name = nodeName(child);
    if (name === undefined) {
      continue;
    }
    if (name === TEXT) {
      output += typeof child[TEXT] === 'string' ? child[TEXT] : '';
    } else if (name === CDATA) {
      output += textOf(child, CDATA);
    } else if (name === COMMENT) {
      output += `<!--${textOf(child, COMMENT)}-->`;
    } else {
      const attributes = Object.entries(nodeAttributes(child))
        .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
        .join('');
      const inner = renderInner(nodeChildren(child, name));
      output += inner ? `<${name}${attributes}>${inner}</${name}>` : `<${name}${attributes}/>`;
    }
  }
  return output;
}

// ─────────────────────────────────────────────────────────────────────────────
// Android escaping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve Android's backslash escapes. A value wrapped in double quotes is
 * taken verbatim between them.
 */
export function unescapeAndroid(raw: string): string {
  const quoted = raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"') && !raw.endsWith('\\"');
  const text = quoted ? raw.slice(1, -1) : raw;
  return text.replace(/\\(u[0-9a-fA-F]{4}|.)/g, (_match, escaped: string) => {
    if (escaped.length === 5) {
      return String.fromCharCode(parseInt(escaped.slice(1), 16));
    }
    switch (escaped) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      default:
        return escaped;
    }
  });
}

// Well-formed tags only; anything else that starts with `<` is text.
const MARKUP = /<\/?[A-Za-z][\w:.-]*(?:\s+[\w:.-]+\s*=\s*(?:"[^"]*"|'[^']*'))*\s*\/?>|<!--[\s\S]*?-->/g;

function escapeAndroidText(text: string, leading: boolean): string {
  const escaped = text
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/&(?!(?:[A-Za-z]+|#\d+|#x[0-9A-Fa-f]+);)/g, '&amp;')
    .replace(/</g, '&lt;');
  return leading ? escaped.replace(/^([@?])/, '\\$1') : escaped;
}

/**
 * Escape a value for the body of a `<string>` or `<item>`, leaving inline
 * markup untouched.
 */
export function escapeAndroid(value: string): string {
  let output = '';
  let last = 0;
  for (const match of value.matchAll(MARKUP)) {
    const index = match.index ?? 0;
    output += escapeAndroidText(value.slice(last, index), last === 0) + match[0];
    last = index + match[0].length;
  }
  return output + escapeAndroidText(value.slice(last), last === 0);
}

// ─────────────────────────────────────────────────────────────────────────────
// Parse
// ─────────────────────────────────────────────────────────────────────────────

function readAttributes(attributes: Record<string, string>): { status?: EntryStatus; custom: Record<string, string> } {
  const custom: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (key !== 'name' && key !== 'translatable') {
      custom[`${XML_ATTRIBUTE_PREFIX}${key}`] = value;
    }
  }
  return {
    status: attributes.translatable === 'false' ? 'do_not_translate' : undefined,
    custom,
  };
}

function parseAndroid(source: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  const anomalies = new AnomalyCollector(TAG, options.strict ?? false);
  const text = decodeSource(source);

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new ParseError(`Invalid XML: ${validation.err.msg}`, TAG, { line: validation.err.line });
  }

  const parsed: unknown = parser.parse(text);
  const documentNodes = Array.isArray(parsed) ? parsed.filter(isXmlNode) : [];
  const root = documentNodes.find((node) => nodeName(node) === 'resources');
  if (!root) {
    throw new ParseError('Missing <resources> root element', TAG);
  }

  const language = anomalies.resolveLanguage(options);
  const entries: Entry[] = [];
  const seen = new Set<string>();
  let comment: string | undefined;

  const accept = (name: string | undefined, element: string): name is string => {
    if (!name) {
      anomalies.report(`<${element}> without a name attribute skipped`);
      return false;
    }
    if (seen.has(name)) {
      anomalies.report(`Duplicate resource name "${name}"; keeping the first definition`, { key: name });
      return false;
    }
    seen.add(name);
    return true;
  };

  for (const node of nodeChildren(root, 'resources')) {
    const element = nodeName(node);
    if (element === undefined || element === TEXT) {
      continue;
    }
    if (element === COMMENT) {
      comment = textOf(node, COMMENT).trim() || undefined;
      continue;
    }

    const attributes = nodeAttributes(node);
    const { status, custom } = readAttributes(attributes);
    const pendingComment = comment;
    comment = undefined;

    if (element === 'string') {
      if (!accept(attributes.name, element)) {
        continue;
      }
      entries.push(
        createEntry({
          key: attributes.name,
          language,
          value: singular(unescapeAndroid(renderInner(nodeChildren(node, element)))),
          status,
          comment: pendingComment,
          custom,
        })
      );
      continue;
    }

    if (element === 'plurals') {
      if (!accept(attributes.name, element)) {
        continue;
      }
      const key = attributes.name;
      const forms: PluralForms = {};
      for (const item of nodeChildren(node, element)) {
        const itemName = nodeName(item);
        if (itemName !== 'item') {
          if (itemName !== TEXT && itemName !== COMMENT && itemName !== undefined) {
            anomalies.report(`Unexpected <${itemName}> in plurals "${key}"`, { key });
          }
          continue;
        }
        const quantity = nodeAttributes(item).quantity ?? '';
        const category = parsePluralCategory(quantity);
        if (!category) {
          anomalies.report(`Unknown plural quantity "${quantity}" in "${key}"; item skipped`, { key });
          continue;
        }
        forms[category] = unescapeAndroid(renderInner(nodeChildren(item, 'item')));
      }
      if (!orderedCategories(forms).length) {
        anomalies.report(`Plurals "${key}" has no usable items; entry skipped`, { key });
        continue;
      }
      entries.push(createEntry({ key, language, value: plural(forms), status, comment: pendingComment, custom }));
      continue;
    }

    anomalies.report(`Unsupported element <${element}> skipped`, attributes.name ? { key: attributes.name } : {});
  }

  const resource: Resource = { metadata: { language }, entries };
  return { resource, warnings: anomalies.warnings };
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialize
// ─────────────────────────────────────────────────────────────────────────────

function renderAttributes(entry: Entry): string {
  let output = ` name="${escapeAttribute(entry.key)}"`;
  if (entry.status === 'do_not_translate') {
    output += ' translatable="false"';
  }
  for (const [key, value] of Object.entries(entry.custom)) {
    if (key.startsWith(XML_ATTRIBUTE_PREFIX)) {
      output += ` ${key.slice(XML_ATTRIBUTE_PREFIX.length)}="${escapeAttribute(value)}"`;
    }
  }
  return output;
}

function serializeAndroid(resource: Resource, options: SerializeOptions = {}): SerializeResult {
  const warnings: FormatWarning[] = [];
  const { entries } = selectLanguageEntries(resource, TAG, options.language);
  const lines = ['<?xml version="1.0" encoding="utf-8"?>', '<resources>'];

  for (const entry of entries) {
    if (entry.comment) {
      lines.push(`${INDENT}<!-- ${entry.comment.replace(/--/g, '- -')} -->`);
    }
    const attributes = renderAttributes(entry);
    if (entry.value.kind === 'singular') {
      lines.push(`${INDENT}<string${attributes}>${escapeAndroid(entry.value.value)}</string>`);
      continue;
    }
    lines.push(`${INDENT}<plurals${attributes}>`);
    for (const category of orderedCategories(entry.value.forms)) {
      const form = entry.value.forms[category] ?? '';
      lines.push(`${INDENT}${INDENT}<item quantity="${category}">${escapeAndroid(form)}</item>`);
    }
    lines.push(`${INDENT}</plurals>`);
  }

  lines.push('</resources>');
  return { output: `${lines.join('\n')}\n`, warnings };
}

export const androidFormat: FormatAdapter = {
  tag: TAG,
  description: 'Android strings.xml (single language, plurals)',
  extensions: ['.xml'],
  capabilities: { plurals: true, multiLanguage: false },
  parse: parseAndroid,
  serialize: serializeAndroid,
};
