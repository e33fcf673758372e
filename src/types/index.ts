import type { AppError } from '@/lib/errors';

// Subscribed feed (row shape of `feeds` joined with its unread count)
export interface Feed {
  id: string;
  url: string;
  title: string;
  category_id: string | null;
  last_fetched_at: string | null;
  last_fetch_error: string | null;
  consecutive_failures: number;
  unread_count: number;
  created_at: string;
}

export interface FeedInput {
  url: string;
  title: string;
  category_id?: string | null;
}

// Grouping node; parent references form a forest
export interface Category {
  id: string;
  name: string;
  parent_id: string | null;
  collapsed: boolean;
}

export interface CategoryInput {
  name: string;
  parent_id: string | null;
}

// Stored article. Dedup key is (feed_id, guid).
export interface Article {
  id: string;
  feed_id: string;
  guid: string;
  title: string;
  url: string | null;
  summary: string | null;
  content: string | null;
  published_at: string | null;
  fetched_at: string;
  is_read: boolean;
  is_starred: boolean;
}

// Parsed article that has not been stored yet
export interface ArticleDraft {
  guid: string;
  title: string;
  url: string | null;
  summary: string | null;
  published_at: string | null;
}

export interface ParsedFeed {
  title: string | null;
  articles: ArticleDraft[];
}

export type ArticleFlag = 'read' | 'starred';

export interface ArticleFilter {
  unreadOnly?: boolean;
  starredOnly?: boolean;
  limit?: number;
}

export type View = 'browse' | 'reader' | 'stats';

export type Focus = 'categories' | 'feeds' | 'articles';

export type RefreshTrigger = 'manual' | 'auto' | 'single';

export interface LogEvent {
  timestamp: string;
  phase: string;
  level: 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
}

export interface RefreshTally {
  batchId: number;
  succeeded: number;
  failed: number;
  skipped: number;
  networkFailures: number;
  newArticles: number;
}

// Final state of a refresh batch's log row
export interface RefreshLogRecord {
  status: 'success' | 'error';
  durationMs: number;
  tally: RefreshTally;
  events: LogEvent[];
  error?: string;
}

// Reading activity over a window of days
export interface ReadingStats {
  articlesRead: number;
  articlesPerDay: number;
  totalMinutes: number;
  // Most-read feeds first, at most ten
  topFeeds: Array<{ title: string; count: number }>;
}

export interface StatsData {
  today: ReadingStats;
  week: ReadingStats;
  month: ReadingStats;
}

export type FeedFetchOutcome =
  | { ok: true; articles: Article[]; newArticles: number; fetchedAt: string }
  | { ok: false; error: AppError };

export type ContentOutcome =
  | { ok: true; content: string }
  | { ok: false; error: AppError };

export type SearchOutcome =
  | { ok: true; articles: Article[] }
  | { ok: false; error: AppError };

// Outcome notifications from background work, consumed by the event loop
export type AppEvent =
  | { type: 'feed_fetched'; batchId: number; feedId: string; outcome: FeedFetchOutcome }
  | { type: 'refresh_complete'; tally: RefreshTally }
  | { type: 'content_loaded'; articleId: string; generation: number; outcome: ContentOutcome }
  | { type: 'search_completed'; query: string; generation: number; outcome: SearchOutcome }
  | { type: 'feed_subscribed'; feed: Feed }
  | { type: 'feed_subscribe_failed'; url: string; error: AppError }
  | { type: 'feed_deleted'; feedId: string; title: string; articlesRemoved: number }
  | { type: 'category_deleted'; categoryId: string; name: string }
  | { type: 'category_collapsed'; categoryId: string; collapsed: boolean }
  | { type: 'category_updated'; category: Category; change: 'renamed' | 'moved' }
  | { type: 'feed_moved'; feedId: string; categoryId: string | null; title: string }
  | { type: 'flag_saved'; articleId: string; flag: ArticleFlag; value: boolean }
  | { type: 'flag_save_failed'; articleId: string; flag: ArticleFlag; previous: boolean; error: AppError }
  | { type: 'reading_session_opened'; session: number; historyId: string }
  | { type: 'reading_session_closed'; historyId: string; durationSeconds: number }
  | { type: 'stats_loaded'; stats: StatsData }
  | { type: 'task_failed'; task: string; error: AppError }
  | { type: 'notice'; message: string }
  | { type: 'shutdown'; reason: string };
