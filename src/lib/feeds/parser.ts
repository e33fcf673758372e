import Parser from 'rss-parser';
import type { ArticleDraft, ParsedFeed } from '@/types';
import { ParseError, errorMessage } from '../errors';
import { normalizeUrl, sha256Hex } from './utils';

type FeedFields = { title?: string };
type ItemFields = { id?: string };

const parser = new Parser<FeedFields, ItemFields>();

function toIsoDate(value: string | undefined): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

function firstText(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  }
  return null;
}

/**
 * Stable identity for an entry: its own guid/id, else the normalized link,
 * else a hash of link, title and publish date.
 */
export function articleGuid(
  existing: string | null,
  url: string | null,
  title: string,
  publishedAt: string | null
): string {
  if (existing) return existing;
  if (url) return normalizeUrl(url);
  return sha256Hex(`${url ?? ''}|${title}|${publishedAt ?? ''}`);
}

export async function parseFeedDocument(xml: string): Promise<ParsedFeed> {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(xml);
  } catch (error) {
    throw new ParseError(`Parse error: ${errorMessage(error)}`, { cause: error });
  }

  const articles: ArticleDraft[] = [];
  const seen = new Set<string>();

  for (const item of feed.items) {
    const title = firstText(item.title) ?? 'Untitled';
    const url = firstText(item.link);
    const publishedAt = toIsoDate(item.isoDate ?? item.pubDate);
    const guid = articleGuid(firstText(item.guid, item.id), url, title, publishedAt);
    // Feeds occasionally repeat an entry; the first occurrence wins
    if (seen.has(guid)) continue;
    seen.add(guid);

    articles.push({
      guid,
      title,
      url: url ? normalizeUrl(url) : null,
      summary: firstText(item.contentSnippet, item.content, item.summary),
      published_at: publishedAt,
    });
  }

  return { title: firstText(feed.title), articles };
}
