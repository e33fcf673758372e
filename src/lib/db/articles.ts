import { sql } from '@vercel/postgres';
import type { Article, ArticleDraft, ArticleFilter, ArticleFlag } from '@/types';
import { toIsoString } from './index';

function parseArticle(row: Record<string, unknown>): Article {
  return {
    id: String(row.id),
    feed_id: String(row.feed_id),
    guid: String(row.guid),
    title: String(row.title),
    url: row.url == null ? null : String(row.url),
    summary: row.summary == null ? null : String(row.summary),
    content: row.content == null ? null : String(row.content),
    published_at: toIsoString(row.published_at),
    fetched_at: toIsoString(row.fetched_at) ?? new Date(0).toISOString(),
    is_read: row.is_read === true,
    is_starred: row.is_starred === true,
  };
}

/**
 * Insert-or-refresh keyed by (feed_id, guid). Read/starred flags and cached
 * content survive a re-fetch. Returns the number of newly inserted rows.
 */
export async function upsertArticles(feedId: string, drafts: ArticleDraft[]): Promise<number> {
  let inserted = 0;
  for (const draft of drafts) {
    const { rows } = await sql`
      INSERT INTO articles (feed_id, guid, title, url, summary, published_at)
      VALUES (${feedId}, ${draft.guid}, ${draft.title}, ${draft.url}, ${draft.summary}, ${draft.published_at})
      ON CONFLICT (feed_id, guid) DO UPDATE
        SET title = EXCLUDED.title,
            url = EXCLUDED.url,
            summary = EXCLUDED.summary,
            published_at = COALESCE(EXCLUDED.published_at, articles.published_at)
      RETURNING (xmax = 0) AS inserted
    `;
    if (rows[0]?.inserted === true) inserted++;
  }
  return inserted;
}

export async function getArticles(feedId: string | 'all', filter: ArticleFilter = {}): Promise<Article[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (feedId !== 'all') {
    params.push(feedId);
    conditions.push(`feed_id = $${params.length}`);
  }
  if (filter.unreadOnly) conditions.push('is_read = FALSE');
  if (filter.starredOnly) conditions.push('is_starred = TRUE');

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  let query = `SELECT * FROM articles ${where} ORDER BY published_at DESC NULLS LAST, fetched_at DESC`;
  if (filter.limit !== undefined) {
    params.push(filter.limit);
    query += ` LIMIT $${params.length}`;
  }

  const { rows } = await sql.query(query, params);
  return rows.map(parseArticle);
}

export async function setArticleFlag(id: string, flag: ArticleFlag, value: boolean): Promise<void> {
  if (flag === 'read') {
    await sql`UPDATE articles SET is_read = ${value} WHERE id = ${id}`;
  } else {
    await sql`UPDATE articles SET is_starred = ${value} WHERE id = ${id}`;
  }
}

export async function saveArticleContent(id: string, content: string): Promise<void> {
  await sql`UPDATE articles SET content = ${content} WHERE id = ${id}`;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export async function searchArticles(query: string, limit: number = 200): Promise<Article[]> {
  const pattern = `%${escapeLike(query)}%`;
  const { rows } = await sql`
    SELECT * FROM articles
    WHERE title ILIKE ${pattern} OR summary ILIKE ${pattern}
    ORDER BY published_at DESC NULLS LAST
    LIMIT ${limit}
  `;
  return rows.map(parseArticle);
}
