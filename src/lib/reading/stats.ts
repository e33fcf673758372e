import type { ReadingStats } from '@/types';
import { stripControlChars } from '../feeds/category-rules';

const TOP_FEEDS = 10;

export interface FeedReading {
  title: string;
  count: number;
  seconds: number;
}

/**
 * Fold per-feed reading totals (most-read first) into window stats.
 * Totals cover every feed; `topFeeds` keeps the first ten.
 */
export function summarizeReading(groups: FeedReading[], days: number): ReadingStats {
  const articlesRead = groups.reduce((sum, g) => sum + g.count, 0);
  const totalSeconds = groups.reduce((sum, g) => sum + Math.max(0, g.seconds), 0);
  return {
    articlesRead,
    articlesPerDay: days > 0 ? articlesRead / days : 0,
    totalMinutes: Math.floor(totalSeconds / 60),
    topFeeds: groups.slice(0, TOP_FEEDS).map(g => ({ title: stripControlChars(g.title), count: g.count })),
  };
}

export function formatReadingTime(minutes: number): string {
  return minutes >= 60 ? `${Math.floor(minutes / 60)}h ${minutes % 60}m` : `${minutes}m`;
}

// "3 articles, 1h 5m reading time", or "no activity"
export function formatStatsLine(stats: ReadingStats): string {
  if (stats.articlesRead === 0 && stats.totalMinutes === 0) return 'no activity';
  const noun = stats.articlesRead === 1 ? 'article' : 'articles';
  return `${stats.articlesRead} ${noun}, ${formatReadingTime(stats.totalMinutes)} reading time`;
}
