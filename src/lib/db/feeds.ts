import { sql } from '@vercel/postgres';
import type { Feed, FeedInput } from '@/types';
import { toIsoString } from './index';

function parseFeed(row: Record<string, unknown>): Feed {
  return {
    id: String(row.id),
    url: String(row.url),
    title: String(row.title),
    category_id: row.category_id == null ? null : String(row.category_id),
    last_fetched_at: toIsoString(row.last_fetched_at),
    last_fetch_error: row.last_fetch_error == null ? null : String(row.last_fetch_error),
    consecutive_failures: Number(row.consecutive_failures ?? 0),
    unread_count: parseInt(String(row.unread_count ?? '0'), 10),
    created_at: toIsoString(row.created_at) ?? new Date(0).toISOString(),
  };
}

// Subscribing to a URL that already exists updates its title and category
export async function upsertFeed(input: FeedInput): Promise<string> {
  const categoryId = input.category_id ?? null;
  const { rows } = await sql`
    INSERT INTO feeds (url, title, category_id)
    VALUES (${input.url}, ${input.title}, ${categoryId})
    ON CONFLICT (url) DO UPDATE
      SET title = EXCLUDED.title,
          category_id = COALESCE(EXCLUDED.category_id, feeds.category_id)
    RETURNING id
  `;
  return String(rows[0].id);
}

export async function getFeedsWithUnreadCounts(): Promise<Feed[]> {
  const { rows } = await sql`
    SELECT f.*, COUNT(a.id) FILTER (WHERE a.is_read = FALSE) AS unread_count
    FROM feeds f
    LEFT JOIN articles a ON a.feed_id = f.id
    GROUP BY f.id
    ORDER BY LOWER(f.title)
  `;
  return rows.map(parseFeed);
}

export async function moveFeedToCategory(id: string, categoryId: string | null): Promise<void> {
  await sql`UPDATE feeds SET category_id = ${categoryId} WHERE id = ${id}`;
}

export async function recordFeedSuccess(id: string, fetchedAt: string): Promise<void> {
  await sql`
    UPDATE feeds
    SET last_fetched_at = ${fetchedAt}, last_fetch_error = NULL, consecutive_failures = 0
    WHERE id = ${id}
  `;
}

export async function recordFeedFailure(id: string, error: string): Promise<number> {
  const { rows } = await sql`
    UPDATE feeds
    SET last_fetch_error = ${error}, consecutive_failures = consecutive_failures + 1
    WHERE id = ${id}
    RETURNING consecutive_failures
  `;
  return rows.length > 0 ? Number(rows[0].consecutive_failures) : 0;
}

// Articles go with the feed (ON DELETE CASCADE); returns how many were removed
export async function deleteFeed(id: string): Promise<number> {
  const { rowCount } = await sql`DELETE FROM articles WHERE feed_id = ${id}`;
  await sql`DELETE FROM feeds WHERE id = ${id}`;
  return rowCount ?? 0;
}
