/**
 * Quire — Feed Decoder
 *
 * Turns a raw response body into normalized Items.
 *
 * The payload's schema is not known up front, so the decoder runs an
 * ordered list of schema attempts and keeps the first one that succeeds
 * structurally:
 *   1. RSS  (rss/channel/item, plus RSS 1.0 rdf:RDF/item)
 *   2. Atom (feed/entry), only when the body is valid UTF-8
 * A structural success wins even when it yields zero items.
 */

import { nanoid } from 'nanoid';
import type { Item } from '../types';
import { DecodeError } from '../lib/errors';
import { cleanText } from './text';
import { tryParseFeedDate } from './dates';
import {
  attribute,
  childText,
  children,
  firstChild,
  hasChild,
  parseXml,
  type XmlElement,
} from './xml';

// ============================================================
// TYPES
// ============================================================

export type SchemaAttemptResult =
  | { ok: true; items: Item[] }
  | { ok: false; reason: string };

export interface SchemaAttempt {
  schema: 'rss' | 'atom';
  decode(bytes: Uint8Array, sourceName: string): Promise<SchemaAttemptResult>;
}

/**
 * Fields a candidate entry yielded before validation.
 */
interface Candidate {
  title?: string;
  link?: string;
  summary?: string;
  date?: string;
}

// ============================================================
// ITEM CONSTRUCTION
// ============================================================

/**
 * Build an Item from a candidate, or null when title or link is missing.
 */
export function buildItem(candidate: Candidate, sourceName: string): Item | null {
  const title = candidate.title === undefined ? '' : cleanText(candidate.title);
  if (!title) return null;

  const link = candidate.link?.trim() ?? '';
  if (!link) return null;

  const summary = candidate.summary === undefined ? '' : cleanText(candidate.summary);
  const pubDate = candidate.date === undefined ? undefined : tryParseFeedDate(candidate.date);

  const item: Item = {
    id: nanoid(),
    sourceName,
    title,
    link,
    ...(summary ? { summary } : {}),
    ...(pubDate ? { pubDate: pubDate.toISOString() } : {}),
  };

  return Object.freeze(item);
}

function collectItems(candidates: Candidate[], sourceName: string): Item[] {
  const items: Item[] = [];
  for (const candidate of candidates) {
    const item = buildItem(candidate, sourceName);
    if (item) items.push(item);
  }
  return items;
}

// ============================================================
// RSS
// ============================================================

function rssCandidate(node: unknown): Candidate {
  return {
    title: childText(node, 'title'),
    link: childText(node, 'link'),
    summary: childText(node, 'description'),
    date: childText(node, 'pubDate') ?? childText(node, 'dc:date'),
  };
}

function rssEntries(document: XmlElement): unknown[] | null {
  if (hasChild(document, 'rss')) {
    const rss = firstChild(document, 'rss');
    if (!hasChild(rss, 'channel')) return null;
    return children(firstChild(rss, 'channel'), 'item');
  }

  if (hasChild(document, 'rdf:RDF')) {
    return children(firstChild(document, 'rdf:RDF'), 'item');
  }

  return null;
}

const lenientUtf8 = new TextDecoder('utf-8');

export const rssAttempt: SchemaAttempt = {
  schema: 'rss',
  async decode(bytes, sourceName) {
    const parsed = await parseXml(lenientUtf8.decode(bytes));
    if (!parsed.ok) return parsed;

    const entries = rssEntries(parsed.document);
    if (!entries) {
      return { ok: false, reason: 'missing rss channel' };
    }

    return { ok: true, items: collectItems(entries.map(rssCandidate), sourceName) };
  },
};

// ============================================================
// ATOM
// ============================================================

/**
 * First rel="alternate" link (rel defaults to alternate), else the first link.
 */
function atomLink(entry: unknown): string | undefined {
  const links = children(entry, 'link');
  const alternate = links.find(link => (attribute(link, 'rel') ?? 'alternate') === 'alternate');
  const chosen = alternate ?? links[0];
  return chosen === undefined ? undefined : attribute(chosen, 'href');
}

function atomCandidate(entry: unknown): Candidate {
  return {
    title: childText(entry, 'title'),
    link: atomLink(entry),
    summary: childText(entry, 'summary') ?? childText(entry, 'content'),
    date: childText(entry, 'published') ?? childText(entry, 'updated'),
  };
}

export const atomAttempt: SchemaAttempt = {
  schema: 'atom',
  async decode(bytes, sourceName) {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      return { ok: false, reason: 'body is not valid UTF-8' };
    }

    const parsed = await parseXml(text);
    if (!parsed.ok) return parsed;

    if (!hasChild(parsed.document, 'feed')) {
      return { ok: false, reason: 'missing atom feed element' };
    }

    const entries = children(firstChild(parsed.document, 'feed'), 'entry');
    return { ok: true, items: collectItems(entries.map(atomCandidate), sourceName) };
  },
};

// ============================================================
// DECODER
// ============================================================

export const SCHEMA_ATTEMPTS: readonly SchemaAttempt[] = [rssAttempt, atomAttempt];

/**
 * Decode a feed body into Items stamped with `sourceName`.
 *
 * @throws DecodeError when no schema attempt succeeds structurally
 */
export async function decodeFeed(bytes: Uint8Array, sourceName: string): Promise<Item[]> {
  const reasons: string[] = [];

  for (const attempt of SCHEMA_ATTEMPTS) {
    const result = await attempt.decode(bytes, sourceName);
    if (result.ok) return result.items;
    reasons.push(`${attempt.schema}: ${result.reason}`);
  }

  throw new DecodeError(`Failed to parse feed from ${sourceName} as RSS or Atom`, {
    cause: reasons.join('; '),
  });
}
