import { describe, it, expect } from 'vitest';
import type { ParsedFeed } from '@/types';
import { NetworkError, ParseError } from '@/lib/errors';
import { findFeedLink } from '@/lib/feeds/discovery';
import { subscribeToFeed, type FeedSource } from '@/lib/feeds/subscriptions';
import { MemoryStorage } from './support/memory-storage';

const PAGE = 'https://blog.test/posts/';

describe('findFeedLink', () => {
  it('resolves an RSS link against the page', () => {
    const html = '<head><link rel="alternate" type="application/rss+xml" title="RSS" href="/feed.xml"></head>';
    expect(findFeedLink(html, PAGE)).toBe('https://blog.test/feed.xml');
  });

  it('accepts any attribute order, case and quoting', () => {
    const html = "<LINK href='atom.xml' TYPE='application/atom+xml' rel='alternate'>";
    expect(findFeedLink(html, PAGE)).toBe('https://blog.test/posts/atom.xml');
  });

  it('handles protocol-relative and entity-encoded hrefs', () => {
    expect(findFeedLink('<link rel="alternate" type="application/rss+xml" href="//cdn.test/rss">', PAGE))
      .toBe('https://cdn.test/rss');
    expect(findFeedLink('<link rel="alternate" type="application/rss+xml" href="/feed?format=rss&amp;lang=en">', PAGE))
      .toBe('https://blog.test/feed?format=rss&lang=en');
  });

  it('skips links that are not feeds', () => {
    const html = [
      '<link rel="stylesheet" href="/site.css">',
      '<link rel="alternate" hreflang="de" type="text/html" href="/de/">',
      '<link rel="alternate" type="application/atom+xml" href="/second.xml">',
    ].join('\n');
    expect(findFeedLink(html, PAGE)).toBe('https://blog.test/second.xml');
    expect(findFeedLink('<link rel="icon" href="/favicon.ico">', PAGE)).toBeNull();
  });
});

// Documents by URL; anything starting with <rss parses as a feed
function siteSource(pages: Record<string, string>): FeedSource & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    async fetchDocument(url: string): Promise<string> {
      fetched.push(url);
      const body = pages[url];
      if (body === undefined) throw new NetworkError('HTTP error: status 404', 'http', 404);
      return body;
    },
    async parseFeed(body: string): Promise<ParsedFeed> {
      if (!body.startsWith('<rss')) throw new ParseError('Parse error: Feed not recognized as RSS 1 or 2.');
      return { title: 'Site feed', articles: [] };
    },
  };
}

describe('subscribeToFeed with a site URL', () => {
  it('follows the feed a page advertises', async () => {
    const storage = new MemoryStorage();
    const source = siteSource({
      'https://site.test/': '<html><head><link rel="alternate" type="application/rss+xml" href="/rss.xml"></head></html>',
      'https://site.test/rss.xml': '<rss></rss>',
    });

    const feed = await subscribeToFeed(storage, 'https://site.test', source);

    expect(source.fetched).toEqual(['https://site.test/', 'https://site.test/rss.xml']);
    expect(feed.url).toBe('https://site.test/rss.xml');
    expect(feed.title).toBe('Site feed');
  });

  it('reports a page without a feed link as a parse error', async () => {
    const storage = new MemoryStorage();
    const source = siteSource({ 'https://site.test/plain': '<html><body>hello</body></html>' });

    await expect(subscribeToFeed(storage, 'https://site.test/plain', source))
      .rejects.toThrow(new ParseError('No feed found at https://site.test/plain'));
    expect(storage.feeds.size).toBe(0);
  });

  it('does not scan for links when the page itself failed to load', async () => {
    const storage = new MemoryStorage();
    const source = siteSource({});

    await expect(subscribeToFeed(storage, 'https://site.test/gone', source)).rejects.toBeInstanceOf(NetworkError);
    expect(source.fetched).toEqual(['https://site.test/gone']);
  });

  it('refuses a discovered link that is not http(s)', async () => {
    const storage = new MemoryStorage();
    const source = siteSource({
      'https://site.test/': '<link rel="alternate" type="application/rss+xml" href="ftp://files.test/rss">',
    });

    await expect(subscribeToFeed(storage, 'https://site.test/', source)).rejects.toBeInstanceOf(NetworkError);
    expect(source.fetched).toEqual(['https://site.test/']);
  });
});
