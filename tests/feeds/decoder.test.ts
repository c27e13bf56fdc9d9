/**
 * Tests for the Feed Decoder (RSS first, Atom second)
 */

import { describe, it, expect } from 'vitest';
import { atomAttempt, buildItem, decodeFeed, rssAttempt } from '../../src/feeds/decoder';
import { DecodeError } from '../../src/lib/errors';
import { encode, fixture } from '../helpers';

describe('decodeFeed', () => {
  describe('RSS', () => {
    it('should extract and normalize every valid item', async () => {
      const items = await decodeFeed(fixture('tech-news.rss.xml'), 'Tech News');

      expect(items).toHaveLength(3);
      expect(items[0]).toMatchObject({
        sourceName: 'Tech News',
        title: 'Breaking: New Parser Framework Released',
        link: 'https://technews.example.com/parser-framework',
        summary: 'A revolutionary parser framework has been released today.',
        pubDate: '2025-01-15T09:30:00.000Z',
      });
      expect(items[1].pubDate).toBe('2025-01-14T23:00:00.000Z');
      expect(items[1].summary).toBe('Six storage engines under the same workload.');
    });

    it('should treat unparseable dates and missing descriptions as absent', async () => {
      const items = await decodeFeed(fixture('tech-news.rss.xml'), 'Tech News');
      const outlook = items[2];

      expect(outlook.title).toBe('Quarterly Outlook');
      expect(outlook.pubDate).toBeUndefined();
      expect(outlook.summary).toBeUndefined();
      expect('pubDate' in outlook).toBe(false);
    });

    it('should skip items without a usable title or link', async () => {
      const items = await decodeFeed(fixture('missing-fields.rss.xml'), 'Test');

      expect(items.map(item => item.title)).toEqual(['Valid Item', 'Another Valid Item']);
      expect(items[1].link).toBe('https://example.com/valid2');
    });

    it('should decode HTML entities in titles and summaries', async () => {
      const items = await decodeFeed(fixture('entities.rss.xml'), 'Entities');

      expect(items[0].title).toBe('Article & Title <with> entities');
      expect(items[0].summary).toBe('"Quoted" © 2025 ® Brand™');
      expect(items[1].title).toBe('Café 日本 notes');
      expect(items[1].summary).toBe('Launch 🚀 day');
    });

    it('should return zero items for a channel without items', async () => {
      const xml = `<?xml version="1.0"?>
        <rss version="2.0"><channel><title>Empty Feed</title><link>https://example.com</link></channel></rss>`;

      await expect(decodeFeed(encode(xml), 'Empty')).resolves.toEqual([]);
    });

    it('should return zero items for an empty channel element', async () => {
      await expect(decodeFeed(encode('<rss version="2.0"><channel></channel></rss>'), 'Empty')).resolves.toEqual([]);
    });

    it('should read RSS 1.0 documents', async () => {
      const xml = `<?xml version="1.0"?>
        <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/"
                 xmlns:dc="http://purl.org/dc/elements/1.1/">
          <channel rdf:about="https://example.com/"><title>RDF</title></channel>
          <item rdf:about="https://example.com/one">
            <title>First RDF Item</title>
            <link>https://example.com/one</link>
            <dc:date>2025-03-01T10:00:00Z</dc:date>
          </item>
        </rdf:RDF>`;

      const items = await decodeFeed(encode(xml), 'RDF');

      expect(items).toHaveLength(1);
      expect(items[0]).toMatchObject({
        title: 'First RDF Item',
        link: 'https://example.com/one',
        pubDate: '2025-03-01T10:00:00.000Z',
      });
    });
  });

  describe('Atom', () => {
    it('should extract entries with link, summary and date preferences', async () => {
      const items = await decodeFeed(fixture('dev-blog.atom.xml'), 'Dev Blog');

      expect(items.map(item => item.title)).toEqual([
        'Understanding Async Iterators',
        'Building CLI Tools',
        'Release Notes',
      ]);

      expect(items[0]).toMatchObject({
        sourceName: 'Dev Blog',
        link: 'https://devblog.example.com/async-iterators',
        summary: 'How async iterators & generators fit together.',
        pubDate: '2025-02-01T06:15:00.000Z',
      });
    });

    it('should fall back to content and updated', async () => {
      const items = await decodeFeed(fixture('dev-blog.atom.xml'), 'Dev Blog');

      expect(items[1]).toMatchObject({
        link: 'https://devblog.example.com/cli-tools',
        summary: '<p>Flags, subcommands and exit codes.</p>',
        pubDate: '2025-01-20T12:00:00.000Z',
      });
    });

    it('should use the first link when none is alternate', async () => {
      const items = await decodeFeed(fixture('dev-blog.atom.xml'), 'Dev Blog');

      expect(items[2].link).toBe('https://devblog.example.com/release-notes.pdf');
      expect(items[2].summary).toBeUndefined();
    });

    it('should read xhtml title and content constructs as text', async () => {
      const items = await decodeFeed(fixture('xhtml.atom.xml'), 'Markup Notes');

      expect(items).toHaveLength(1);
      expect(items[0]).toMatchObject({
        title: 'Hello World',
        link: 'https://notes.example.com/hello-world',
        summary: 'Flags and exit codes',
        pubDate: '2025-03-10T09:00:00.000Z',
      });
    });

    it('should return zero items for a feed without entries', async () => {
      const xml = '<feed xmlns="http://www.w3.org/2005/Atom"><title>Quiet</title></feed>';
      await expect(decodeFeed(encode(xml), 'Quiet')).resolves.toEqual([]);
    });
  });

  describe('identity', () => {
    it('should give every item a fresh id on each decode', async () => {
      const first = await decodeFeed(fixture('tech-news.rss.xml'), 'Tech News');
      const second = await decodeFeed(fixture('tech-news.rss.xml'), 'Tech News');

      const ids = [...first, ...second].map(item => item.id);
      expect(new Set(ids).size).toBe(6);
      expect(first[0].link).toBe(second[0].link);
      expect(first[0].id).not.toBe(second[0].id);
    });

    it('should freeze items', async () => {
      const [item] = await decodeFeed(fixture('tech-news.rss.xml'), 'Tech News');
      expect(Object.isFrozen(item)).toBe(true);
    });
  });

  describe('structural failures', () => {
    it('should reject bytes that are not XML', async () => {
      await expect(decodeFeed(encode('this is not a feed'), 'Broken')).rejects.toThrow(DecodeError);
      await expect(decodeFeed(encode('this is not a feed'), 'Broken')).rejects.toThrow(
        'Failed to parse feed from Broken as RSS or Atom'
      );
    });

    it('should reject an empty body', async () => {
      await expect(decodeFeed(new Uint8Array(), 'Empty')).rejects.toThrow(DecodeError);
    });

    it('should reject well-formed XML of another vocabulary', async () => {
      await expect(decodeFeed(encode('<html><body><p>Hi</p></body></html>'), 'Page')).rejects.toThrow(
        DecodeError
      );
    });

    it('should reject an rss root without a channel', async () => {
      await expect(decodeFeed(encode('<rss version="2.0"></rss>'), 'Bare')).rejects.toThrow(DecodeError);
    });

    it('should reject truncated XML', async () => {
      const xml = '<rss version="2.0"><channel><item><title>Cut off</title>';
      await expect(decodeFeed(encode(xml), 'Truncated')).rejects.toThrow(DecodeError);
    });
  });
});

describe('schema attempts', () => {
  it('should report RSS failure for an Atom document', async () => {
    const result = await rssAttempt.decode(fixture('dev-blog.atom.xml'), 'Dev Blog');
    expect(result).toEqual({ ok: false, reason: 'missing rss channel' });
  });

  it('should report Atom failure for invalid UTF-8', async () => {
    const bytes = new Uint8Array([0x3c, 0x66, 0x65, 0x65, 0x64, 0x3e, 0xff, 0xfe, 0x3c, 0x2f, 0x66, 0x65, 0x65, 0x64, 0x3e]);
    const result = await atomAttempt.decode(bytes, 'Binary');
    expect(result).toEqual({ ok: false, reason: 'body is not valid UTF-8' });
  });
});

describe('buildItem', () => {
  it('should return null when the title cleans down to nothing', () => {
    expect(buildItem({ title: '&nbsp; \n', link: 'https://example.com' }, 'S')).toBeNull();
  });

  it('should return null without a link', () => {
    expect(buildItem({ title: 'Title' }, 'S')).toBeNull();
  });

  it('should omit an empty summary', () => {
    const item = buildItem({ title: 'Title', link: 'https://example.com', summary: '   ' }, 'S');
    expect(item).not.toBeNull();
    expect(item && 'summary' in item).toBe(false);
  });
});
