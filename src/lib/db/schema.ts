import { sql } from '@vercel/postgres';

export async function ensureSchema(): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS categories (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      name TEXT NOT NULL,
      parent_id TEXT REFERENCES categories(id) ON DELETE SET NULL,
      collapsed BOOLEAN DEFAULT FALSE,
      created_at TIMESTAMPTZ DEFAULT NOW()
    )
  `;

  // One category per name under a given parent; NULL parent counts as a value
  await sql`
    CREATE UNIQUE INDEX IF NOT EXISTS categories_name_parent_idx
    ON categories (name, COALESCE(parent_id, ''))
  `;

  await sql`
    CREATE TABLE IF NOT EXISTS feeds (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      url TEXT UNIQUE NOT NULL,
      title TEXT NOT NULL,
      category_id TEXT REFERENCES categories(id) ON DELETE SET NULL,
      last_fetched_at TIMESTAMPTZ,
      last_fetch_error TEXT,
      consecutive_failures INTEGER DEFAULT 0,
      created_at TIMESTAMPTZ DEFAULT NOW()
    )
  `;

  await sql`
    CREATE TABLE IF NOT EXISTS articles (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      feed_id TEXT NOT NULL REFERENCES feeds(id) ON DELETE CASCADE,
      guid TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT,
      summary TEXT,
      content TEXT,
      published_at TIMESTAMPTZ,
      fetched_at TIMESTAMPTZ DEFAULT NOW(),
      is_read BOOLEAN DEFAULT FALSE,
      is_starred BOOLEAN DEFAULT FALSE,
      UNIQUE(feed_id, guid)
    )
  `;

  await sql`
    CREATE INDEX IF NOT EXISTS articles_feed_published_idx
    ON articles (feed_id, published_at DESC)
  `;

  await sql`
    CREATE TABLE IF NOT EXISTS refresh_logs (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      trigger TEXT NOT NULL CHECK (trigger IN ('manual', 'auto', 'single')),
      status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'success', 'error')),
      started_at TIMESTAMPTZ DEFAULT NOW(),
      finished_at TIMESTAMPTZ,
      duration_ms INTEGER,
      summary JSONB DEFAULT '{}',
      events JSONB DEFAULT '[]',
      error TEXT
    )
  `;

  await sql`
    CREATE TABLE IF NOT EXISTS reading_history (
      id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::text,
      article_id TEXT NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
      feed_id TEXT NOT NULL REFERENCES feeds(id) ON DELETE CASCADE,
      opened_at TIMESTAMPTZ DEFAULT NOW(),
      closed_at TIMESTAMPTZ,
      duration_seconds INTEGER
    )
  `;

  await sql`
    CREATE INDEX IF NOT EXISTS reading_history_opened_idx
    ON reading_history (opened_at)
  `;
}

// Drops every table this app owns. Used by --reset-db before ensureSchema.
export async function dropSchema(): Promise<void> {
  await sql`DROP TABLE IF EXISTS reading_history`;
  await sql`DROP TABLE IF EXISTS refresh_logs`;
  await sql`DROP TABLE IF EXISTS articles`;
  await sql`DROP TABLE IF EXISTS feeds`;
  await sql`DROP TABLE IF EXISTS categories`;
}
