import { describe, it, expect } from 'vitest';
import { countFeeds, decodeOpml, encodeOpml, type OpmlOutline } from '@/lib/feeds/opml';
import { buildOpmlTree, importOpml, subscribeToFeed } from '@/lib/feeds/subscriptions';
import { NetworkError, ParseError } from '@/lib/errors';
import { MemoryStorage } from './support/memory-storage';

const NESTED_OPML = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>My feeds</title></head>
  <body>
    <outline text="Tech" title="Tech">
      <outline text="Web" title="Web">
        <outline text="Frontend" title="Frontend">
          <outline type="rss" text="CSS Weekly" title="CSS Weekly" xmlUrl="https://css.test/feed"/>
        </outline>
        <outline type="rss" text="Web Dev" xmlUrl="https://webdev.test/rss"/>
      </outline>
      <outline type="rss" title="Tech News" xmlUrl="https://technews.test/atom" htmlUrl="https://technews.test"/>
    </outline>
    <outline type="rss" xmlUrl="https://loose.test/feed"/>
  </body>
</opml>`;

const EXPECTED_TREE: OpmlOutline[] = [
  {
    kind: 'folder',
    title: 'Tech',
    children: [
      {
        kind: 'folder',
        title: 'Web',
        children: [
          {
            kind: 'folder',
            title: 'Frontend',
            children: [{ kind: 'feed', title: 'CSS Weekly', xmlUrl: 'https://css.test/feed', htmlUrl: null }],
          },
          { kind: 'feed', title: 'Web Dev', xmlUrl: 'https://webdev.test/rss', htmlUrl: null },
        ],
      },
      { kind: 'feed', title: 'Tech News', xmlUrl: 'https://technews.test/atom', htmlUrl: 'https://technews.test' },
    ],
  },
  { kind: 'feed', title: 'https://loose.test/feed', xmlUrl: 'https://loose.test/feed', htmlUrl: null },
];

// htmlUrl is not stored
function withoutHtmlUrls(outlines: OpmlOutline[]): OpmlOutline[] {
  return outlines.map(outline =>
    outline.kind === 'feed'
      ? { ...outline, htmlUrl: null }
      : { ...outline, children: withoutHtmlUrls(outline.children) }
  );
}

describe('OPML codec', () => {
  it('decodes nested folders and applies the title fallbacks', async () => {
    expect(await decodeOpml(NESTED_OPML)).toEqual(EXPECTED_TREE);
    expect(countFeeds(EXPECTED_TREE)).toBe(4);
  });

  it('round-trips a three-level tree', async () => {
    const encoded = encodeOpml(EXPECTED_TREE);
    expect(await decodeOpml(encoded)).toEqual(EXPECTED_TREE);
  });

  it('decodes an empty body to no outlines', async () => {
    expect(await decodeOpml('<opml version="2.0"><head/><body/></opml>')).toEqual([]);
  });

  it('rejects documents that are not OPML', async () => {
    await expect(decodeOpml('<rss><channel/></rss>')).rejects.toBeInstanceOf(ParseError);
    await expect(decodeOpml('<opml><body>')).rejects.toBeInstanceOf(ParseError);
  });
});

describe('subscriptions', () => {
  it('imports folders as nested categories and is idempotent', async () => {
    const storage = new MemoryStorage();

    const summary = await importOpml(storage, EXPECTED_TREE);
    expect(summary).toEqual({ categories: 3, feeds: 4 });

    const again = await importOpml(storage, EXPECTED_TREE);
    expect(again).toEqual({ categories: 3, feeds: 4 });
    expect(storage.categories.size).toBe(3);
    expect(storage.feeds.size).toBe(4);

    const categories = await storage.listCategories();
    const tech = categories.find(c => c.name === 'Tech');
    const web = categories.find(c => c.name === 'Web');
    const frontend = categories.find(c => c.name === 'Frontend');
    expect(tech?.parent_id).toBeNull();
    expect(web?.parent_id).toBe(tech?.id);
    expect(frontend?.parent_id).toBe(web?.id);

    const feeds = await storage.listFeeds();
    expect(feeds.find(f => f.url === 'https://css.test/feed')?.category_id).toBe(frontend?.id);
    expect(feeds.find(f => f.url === 'https://loose.test/feed')?.category_id).toBeNull();
  });

  it('exports the stored tree in the imported shape', async () => {
    const storage = new MemoryStorage();
    await importOpml(storage, EXPECTED_TREE);

    const tree = buildOpmlTree(await storage.listCategories(), await storage.listFeeds());
    expect(tree).toEqual(withoutHtmlUrls(EXPECTED_TREE));
  });

  it('exports feeds of categories caught in a parent loop at the top level', () => {
    const tree = buildOpmlTree(
      [
        { id: 'c1', name: 'A', parent_id: 'c2', collapsed: false },
        { id: 'c2', name: 'B', parent_id: 'c1', collapsed: false },
      ],
      [{
        id: 'f1',
        url: 'https://loop.test/feed',
        title: 'Looped',
        category_id: 'c1',
        last_fetched_at: null,
        last_fetch_error: null,
        consecutive_failures: 0,
        unread_count: 0,
        created_at: '2024-01-01T00:00:00.000Z',
      }]
    );
    expect(tree).toEqual([{ kind: 'feed', title: 'Looped', xmlUrl: 'https://loop.test/feed', htmlUrl: null }]);
  });

  it('subscribes under the title the feed reports', async () => {
    const storage = new MemoryStorage();
    const feed = await subscribeToFeed(storage, 'https://new.test/feed/', {
      fetchDocument: async () => '<rss/>',
      parseFeed: async () => ({ title: 'New Feed', articles: [] }),
    });

    expect(feed.url).toBe('https://new.test/feed');
    expect(feed.title).toBe('New Feed');
    expect(storage.feeds.size).toBe(1);
  });

  it('refuses non-http subscription URLs', async () => {
    const storage = new MemoryStorage();
    const source = {
      fetchDocument: async () => '',
      parseFeed: async () => ({ title: null, articles: [] }),
    };
    await expect(subscribeToFeed(storage, 'file:///etc/passwd', source))
      .rejects.toBeInstanceOf(NetworkError);
    expect(storage.feeds.size).toBe(0);
  });
});
