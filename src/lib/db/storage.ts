import type {
  Article,
  ArticleDraft,
  ArticleFilter,
  ArticleFlag,
  Category,
  CategoryInput,
  Feed,
  FeedInput,
  ReadingStats,
  RefreshLogRecord,
  RefreshTrigger,
} from '@/types';
import {
  deleteCategory,
  getCategories,
  moveCategory,
  renameCategory,
  setCategoryCollapsed,
  upsertCategory,
} from './categories';
import {
  deleteFeed,
  getFeedsWithUnreadCounts,
  moveFeedToCategory,
  recordFeedFailure,
  recordFeedSuccess,
  upsertFeed,
} from './feeds';
import { getArticles, saveArticleContent, searchArticles, setArticleFlag, upsertArticles } from './articles';
import { getReadingStats, recordClose, recordOpen } from './reading-history';
import { completeRefreshLog, createRefreshLog, markStaleRefreshLogs } from './refresh-logs';

/**
 * Everything the runtime needs from persistence. Upserts are idempotent
 * under their natural keys (feed URL, article (feed_id, guid), category
 * (name, parent)).
 */
export interface Storage {
  upsertFeed(input: FeedInput): Promise<string>;
  upsertArticles(feedId: string, drafts: ArticleDraft[]): Promise<number>;
  setArticleFlag(articleId: string, flag: ArticleFlag, value: boolean): Promise<void>;
  listFeeds(): Promise<Feed[]>;
  listArticles(feedId: string | 'all', filter?: ArticleFilter): Promise<Article[]>;
  deleteFeed(feedId: string): Promise<number>;
  moveFeedToCategory(feedId: string, categoryId: string | null): Promise<void>;
  recordFeedSuccess(feedId: string, fetchedAt: string): Promise<void>;
  recordFeedFailure(feedId: string, error: string): Promise<number>;
  saveArticleContent(articleId: string, content: string): Promise<void>;
  searchArticles(query: string, limit?: number): Promise<Article[]>;
  listCategories(): Promise<Category[]>;
  upsertCategory(input: CategoryInput): Promise<string>;
  renameCategory(categoryId: string, name: string): Promise<void>;
  // Rejects a parent that would make the category its own ancestor
  moveCategory(categoryId: string, parentId: string | null): Promise<void>;
  setCategoryCollapsed(categoryId: string, collapsed: boolean): Promise<void>;
  deleteCategory(categoryId: string): Promise<void>;
  createRefreshLog(trigger: RefreshTrigger): Promise<string>;
  completeRefreshLog(id: string, record: RefreshLogRecord): Promise<void>;
  markStaleRefreshLogs(): Promise<number>;
  // Starts a reading session row and returns its id
  recordOpen(articleId: string, feedId: string): Promise<string>;
  recordClose(historyId: string, durationSeconds: number): Promise<void>;
  getReadingStats(days: number): Promise<ReadingStats>;
}

export const postgresStorage: Storage = {
  upsertFeed,
  upsertArticles,
  setArticleFlag,
  listFeeds: getFeedsWithUnreadCounts,
  listArticles: getArticles,
  deleteFeed,
  moveFeedToCategory,
  recordFeedSuccess,
  recordFeedFailure,
  saveArticleContent,
  searchArticles,
  listCategories: getCategories,
  upsertCategory,
  renameCategory,
  moveCategory,
  setCategoryCollapsed,
  deleteCategory,
  createRefreshLog,
  completeRefreshLog,
  markStaleRefreshLogs,
  recordOpen,
  recordClose,
  getReadingStats,
};
