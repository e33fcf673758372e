import type { Category, Feed, ParsedFeed } from '@/types';
import type { Storage } from '../db/storage';
import { NetworkError, ParseError, StorageError } from '../errors';
import { log } from '../log';
import { findFeedLink } from './discovery';
import type { OpmlFeed, OpmlOutline } from './opml';
import { isHttpUrl, normalizeUrl } from './utils';

// How subscribing reaches the network; the CLI wires fetch and rss-parser in
export interface FeedSource {
  fetchDocument(url: string): Promise<string>;
  parseFeed(body: string): Promise<ParsedFeed>;
}

export interface ImportSummary {
  categories: number;
  feeds: number;
}

/**
 * Upsert an OPML outline tree. Folders become categories (nested under
 * their parent folder), feeds are attached to the innermost folder.
 * Running the same import twice changes nothing.
 */
export async function importOpml(storage: Storage, outlines: OpmlOutline[]): Promise<ImportSummary> {
  const summary: ImportSummary = { categories: 0, feeds: 0 };

  async function visit(nodes: OpmlOutline[], parentId: string | null): Promise<void> {
    for (const node of nodes) {
      if (node.kind === 'folder') {
        const categoryId = await storage.upsertCategory({ name: node.title, parent_id: parentId });
        summary.categories++;
        await visit(node.children, categoryId);
        continue;
      }

      if (!isHttpUrl(node.xmlUrl)) {
        log.warn('opml', `Skipping outline with non-http feed URL: ${node.xmlUrl}`);
        continue;
      }
      await storage.upsertFeed({ url: normalizeUrl(node.xmlUrl), title: node.title, category_id: parentId });
      summary.feeds++;
    }
  }

  await visit(outlines, null);
  return summary;
}

/**
 * Rebuild the outline tree from stored categories and feeds. Uncategorized
 * feeds (and feeds of categories unreachable from a root) come last at the
 * top level.
 */
export function buildOpmlTree(categories: Category[], feeds: Feed[]): OpmlOutline[] {
  const feedsByCategory = new Map<string | null, OpmlFeed[]>();
  const known = new Set(categories.map(c => c.id));

  for (const feed of feeds) {
    const key = feed.category_id && known.has(feed.category_id) ? feed.category_id : null;
    const list = feedsByCategory.get(key) ?? [];
    list.push({ kind: 'feed', title: feed.title, xmlUrl: feed.url, htmlUrl: null });
    feedsByCategory.set(key, list);
  }

  const visited = new Set<string>();

  function folder(category: Category): OpmlOutline {
    visited.add(category.id);
    const children: OpmlOutline[] = categories
      .filter(c => c.parent_id === category.id && !visited.has(c.id))
      .map(folder);
    return {
      kind: 'folder',
      title: category.name,
      children: [...children, ...(feedsByCategory.get(category.id) ?? [])],
    };
  }

  const roots = categories
    .filter(c => c.parent_id === null || !known.has(c.parent_id))
    .map(folder);

  const orphans: OpmlOutline[] = [];
  for (const category of categories) {
    if (!visited.has(category.id)) {
      // Part of a parent cycle; export flat rather than lose its feeds
      orphans.push(...(feedsByCategory.get(category.id) ?? []));
    }
  }

  return [...roots, ...(feedsByCategory.get(null) ?? []), ...orphans];
}

function requireHttpUrl(raw: string): string {
  const url = normalizeUrl(raw);
  if (!isHttpUrl(url)) {
    throw new NetworkError(`Not an http(s) URL: ${raw}`, 'connection');
  }
  return url;
}

/**
 * Fetch and parse `url`. When the document is not a feed, treat it as a
 * web page and follow the feed it advertises in its `<link>` tags.
 */
export async function discoverFeed(
  url: string,
  source: FeedSource
): Promise<{ url: string; parsed: ParsedFeed }> {
  const body = await source.fetchDocument(url);
  try {
    return { url, parsed: await source.parseFeed(body) };
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    const link = findFeedLink(body, url);
    if (!link) {
      throw new ParseError(`No feed found at ${url}`, { cause: error });
    }
    const feedUrl = requireHttpUrl(link);
    log.info('subscriptions', `Found feed ${feedUrl} on page ${url}`);
    return { url: feedUrl, parsed: await source.parseFeed(await source.fetchDocument(feedUrl)) };
  }
}

/**
 * Validate a feed or site URL by fetching and parsing it, then store the
 * subscription under the feed's own title.
 */
export async function subscribeToFeed(storage: Storage, rawUrl: string, source: FeedSource): Promise<Feed> {
  const { url, parsed } = await discoverFeed(requireHttpUrl(rawUrl), source);
  const id = await storage.upsertFeed({ url, title: parsed.title ?? url });
  const feeds = await storage.listFeeds();
  const feed = feeds.find(f => f.id === id);
  if (!feed) {
    throw new StorageError(`Feed ${url} missing after subscribing`);
  }
  log.info('subscriptions', `Subscribed to ${feed.title}`, { url });
  return feed;
}
