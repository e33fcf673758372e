import { sql } from '@vercel/postgres';
import type { RefreshLogRecord, RefreshTrigger } from '@/types';

export async function createRefreshLog(trigger: RefreshTrigger): Promise<string> {
  const { rows } = await sql`
    INSERT INTO refresh_logs (trigger)
    VALUES (${trigger})
    RETURNING id
  `;
  return String(rows[0].id);
}

export async function completeRefreshLog(id: string, record: RefreshLogRecord): Promise<void> {
  await sql`
    UPDATE refresh_logs
    SET status = ${record.status},
        finished_at = NOW(),
        duration_ms = ${record.durationMs},
        summary = ${JSON.stringify(record.tally)}::jsonb,
        events = ${JSON.stringify(record.events)}::jsonb,
        error = ${record.error ?? null}
    WHERE id = ${id}
  `;
}

// Rows still "running" belong to a session that exited mid-refresh
export async function markStaleRefreshLogs(): Promise<number> {
  const { rowCount } = await sql`
    UPDATE refresh_logs
    SET status = 'error', finished_at = NOW(), error = 'Interrupted before the refresh finished'
    WHERE status = 'running' AND finished_at IS NULL
  `;
  return rowCount ?? 0;
}
