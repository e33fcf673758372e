import { sql } from '@vercel/postgres';
import type { ReadingStats } from '@/types';
import { summarizeReading } from '../reading/stats';

export async function recordOpen(articleId: string, feedId: string): Promise<string> {
  const { rows } = await sql`
    INSERT INTO reading_history (article_id, feed_id)
    VALUES (${articleId}, ${feedId})
    RETURNING id
  `;
  return String(rows[0].id);
}

// duration_seconds stays NULL for sessions that were never closed
export async function recordClose(historyId: string, durationSeconds: number): Promise<void> {
  const seconds = Math.max(0, Math.floor(durationSeconds));
  await sql`
    UPDATE reading_history
    SET closed_at = NOW(), duration_seconds = ${seconds}
    WHERE id = ${historyId}
  `;
}

// Sessions opened in the last `days` days, grouped by feed
export async function getReadingStats(days: number): Promise<ReadingStats> {
  const { rows } = await sql`
    SELECT f.title,
           COUNT(*)::int AS opened,
           COALESCE(SUM(rh.duration_seconds), 0)::int AS seconds
    FROM reading_history rh
    JOIN feeds f ON f.id = rh.feed_id
    WHERE rh.opened_at > NOW() - make_interval(days => ${days})
    GROUP BY f.id, f.title
    ORDER BY opened DESC, f.title ASC
  `;
  return summarizeReading(
    rows.map(row => ({ title: String(row.title), count: Number(row.opened), seconds: Number(row.seconds) })),
    days
  );
}
