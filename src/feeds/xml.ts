/**
 * Quire — XML Tree Access
 *
 * xml2js hands back an untyped tree: every child element is an array,
 * text-only elements are strings, and elements with attributes are
 * objects holding the text under `_` and attributes under `$`.
 * These helpers narrow that tree without casts.
 */

import { parseStringPromise } from 'xml2js';

export type XmlElement = Record<string, unknown>;

export type XmlParseResult =
  | { ok: true; document: XmlElement }
  | { ok: false; reason: string };

export function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a document, reporting failure as a value rather than a throw.
 */
export async function parseXml(text: string): Promise<XmlParseResult> {
  try {
    const document: unknown = await parseStringPromise(text, { explicitArray: true });
    if (!isElement(document)) {
      return { ok: false, reason: 'document has no root element' };
    }
    return { ok: true, document };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * All child elements named `name`. Text-only children come back as strings.
 */
export function children(node: unknown, name: string): unknown[] {
  if (!isElement(node)) return [];
  const value = node[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function firstChild(node: unknown, name: string): unknown {
  return children(node, name)[0];
}

export function hasChild(node: unknown, name: string): boolean {
  return isElement(node) && node[name] !== undefined;
}

/**
 * Text content of an element, or undefined when it carries none.
 * `<title></title>` and `<title type="text"/>` both yield ''.
 *
 * Nested elements (Atom `type="xhtml"` constructs) contribute their text
 * after the element's own; xml2js does not keep mixed-content order.
 */
export function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (!isElement(node)) return undefined;

  const own = node['_'];
  const parts: string[] = typeof own === 'string' ? [own] : [];

  for (const [key, value] of Object.entries(node)) {
    if (key === '_' || key === '$') continue;
    for (const child of Array.isArray(value) ? value : [value]) {
      const text = textOf(child);
      if (text) parts.push(text);
    }
  }

  return parts.join(' ');
}

export function childText(node: unknown, name: string): string | undefined {
  const child = firstChild(node, name);
  return child === undefined ? undefined : textOf(child);
}

export function attribute(node: unknown, name: string): string | undefined {
  if (!isElement(node)) return undefined;

  const attributes = node['$'];
  if (!isElement(attributes)) return undefined;

  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
}
