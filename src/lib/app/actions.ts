import type { AppEvent, Article, ArticleFlag, Category, Feed, RefreshTrigger, StatsData } from '@/types';
import { beginLoad } from '../content/state';
import { ExtractionError, errorMessage } from '../errors';
import { sanitizeCategoryName, wouldCreateCycle } from '../feeds/category-rules';
import { subscribeToFeed } from '../feeds/subscriptions';
import { log } from '../log';
import type { AppContext } from './context';

// Helpers shared by key commands and event handlers. Anything slow is
// spawned on the task pool; state changes here are synchronous.

export function startRefresh(ctx: AppContext, feeds: Feed[], trigger: RefreshTrigger): void {
  const { state } = ctx;
  if (feeds.length === 0) {
    state.setStatus('No feeds to refresh', 'info', ctx.now());
    return;
  }

  const batch = ctx.coordinator.refresh(feeds, trigger);
  if (batch.total > 0) {
    state.refreshProgress.set(batch.batchId, { done: 0, total: batch.total });
    const label = trigger === 'single'
      ? feeds[0].title
      : `${batch.total} feed${batch.total === 1 ? '' : 's'}`;
    state.setStatus(`Refreshing ${label}...`, 'info', ctx.now());
  } else {
    state.setStatus(`Nothing to refresh (${batch.skipped} skipped)`, 'info', ctx.now());
  }
  log.info('refresh', `Started ${trigger} refresh`, { batchId: batch.batchId, total: batch.total, skipped: batch.skipped });
}

/**
 * Start extracting an article's full text unless a load is already in
 * flight or (without `force`) the content is already loaded.
 */
export function loadContent(ctx: AppContext, article: Article, force: boolean): void {
  const { state } = ctx;
  const url = article.url;
  if (!url) {
    state.setContentState(article.id, {
      status: 'failed',
      error: new ExtractionError('Article has no link'),
      fallback: article.summary,
    });
    return;
  }

  const generation = state.nextContentGeneration();
  const next = beginLoad(state.contentState(article), generation, force);
  if (!next) return;
  state.setContentState(article.id, next);

  const { storage, extractor } = ctx;
  ctx.pool.spawn({
    tag: 'extract',
    errorKind: 'extraction',
    work: async () => {
      const content = await extractor.extract(url);
      try {
        await storage.saveArticleContent(article.id, content);
      } catch (error) {
        log.warn('extract', `Could not cache content for ${url}: ${errorMessage(error)}`);
      }
      return content;
    },
    toEvent: (content): AppEvent => ({
      type: 'content_loaded',
      articleId: article.id,
      generation,
      outcome: { ok: true, content },
    }),
    onError: (error): AppEvent => ({
      type: 'content_loaded',
      articleId: article.id,
      generation,
      outcome: { ok: false, error },
    }),
  });
}

/**
 * Time the article now on screen. The storage row is created in the
 * background; until its id arrives a close is parked in `unsavedReadings`.
 */
export function beginReadingSession(ctx: AppContext, article: Article): void {
  const { state, storage } = ctx;
  endReadingSession(ctx);

  state.readingSessionSeq += 1;
  const session = state.readingSessionSeq;
  state.readingSession = { id: session, articleId: article.id, feedId: article.feed_id, openedAt: ctx.now(), historyId: null };

  ctx.pool.spawn({
    tag: 'reading history',
    work: () => storage.recordOpen(article.id, article.feed_id),
    toEvent: (historyId): AppEvent => ({ type: 'reading_session_opened', session, historyId }),
  });
}

export function endReadingSession(ctx: AppContext): void {
  const { state } = ctx;
  const session = state.readingSession;
  if (!session) return;
  state.readingSession = null;

  const durationSeconds = Math.max(0, Math.floor((ctx.now() - session.openedAt) / 1000));
  if (session.historyId === null) {
    state.unsavedReadings.set(session.id, durationSeconds);
    return;
  }
  saveReadingDuration(ctx, session.historyId, durationSeconds);
}

export function saveReadingDuration(ctx: AppContext, historyId: string, durationSeconds: number): void {
  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'reading history',
    work: () => storage.recordClose(historyId, durationSeconds),
    toEvent: (): AppEvent => ({ type: 'reading_session_closed', historyId, durationSeconds }),
  });
}

// Windows of the stats panel, in days
const STATS_WINDOWS = { today: 1, week: 7, month: 30 } as const;

export function showStats(ctx: AppContext): void {
  const { state, storage } = ctx;
  state.view = 'stats';
  state.stats = null;

  ctx.pool.spawn({
    tag: 'reading stats',
    work: async (): Promise<StatsData> => {
      const [today, week, month] = await Promise.all([
        storage.getReadingStats(STATS_WINDOWS.today),
        storage.getReadingStats(STATS_WINDOWS.week),
        storage.getReadingStats(STATS_WINDOWS.month),
      ]);
      return { today, week, month };
    },
    toEvent: (stats): AppEvent => ({ type: 'stats_loaded', stats }),
  });
}

export function openArticle(ctx: AppContext, article: Article): void {
  const { state } = ctx;
  beginReadingSession(ctx, article);
  state.view = 'reader';
  state.readerArticleId = article.id;
  state.readerScroll = 0;
  if (ctx.options.markReadOnOpen && !article.is_read) {
    setFlag(ctx, article, 'read', true);
  }
  loadContent(ctx, article, false);
}

// Optimistic: memory first, storage in the background, rolled back on failure
export function setFlag(ctx: AppContext, article: Article, flag: ArticleFlag, value: boolean): void {
  const previous = ctx.state.setArticleFlag(article.id, flag, value)
    ?? (flag === 'read' ? article.is_read : article.is_starred);
  const { storage } = ctx;

  ctx.pool.spawn({
    tag: 'flag',
    work: () => storage.setArticleFlag(article.id, flag, value),
    toEvent: (): AppEvent => ({ type: 'flag_saved', articleId: article.id, flag, value }),
    onError: (error): AppEvent => ({ type: 'flag_save_failed', articleId: article.id, flag, previous, error }),
  });
}

export function runSearch(ctx: AppContext): void {
  const { state } = ctx;
  const search = state.search;
  if (!search) return;

  search.editedAt = null;
  const query = search.query.trim();
  if (query.length === 0) {
    // Empty query restores the feed's own article list
    search.results = null;
    state.articleCursor = 0;
    state.dirty = true;
    return;
  }

  state.searchGeneration += 1;
  const generation = state.searchGeneration;
  search.generation = generation;

  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'search',
    work: () => storage.searchArticles(query),
    toEvent: (articles): AppEvent => ({
      type: 'search_completed',
      query,
      generation,
      outcome: { ok: true, articles },
    }),
    onError: (error): AppEvent => ({
      type: 'search_completed',
      query,
      generation,
      outcome: { ok: false, error },
    }),
  });
}

export function subscribe(ctx: AppContext, rawUrl: string): void {
  const url = rawUrl.trim();
  if (url.length === 0) return;
  const { storage, feedSource } = ctx;

  ctx.state.setStatus(`Subscribing to ${url}...`, 'info', ctx.now());
  ctx.pool.spawn({
    tag: 'subscribe',
    errorKind: 'network',
    work: () => subscribeToFeed(storage, url, feedSource),
    toEvent: (feed): AppEvent => ({ type: 'feed_subscribed', feed }),
    onError: (error): AppEvent => ({ type: 'feed_subscribe_failed', url, error }),
  });
}

export function deleteFeed(ctx: AppContext, feed: Feed): void {
  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'delete feed',
    work: () => storage.deleteFeed(feed.id),
    toEvent: (articlesRemoved): AppEvent => ({
      type: 'feed_deleted',
      feedId: feed.id,
      title: feed.title,
      articlesRemoved,
    }),
  });
}

export function deleteCategory(ctx: AppContext, category: Category): void {
  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'delete category',
    work: () => storage.deleteCategory(category.id),
    toEvent: (): AppEvent => ({ type: 'category_deleted', categoryId: category.id, name: category.name }),
  });
}

export function renameCategory(ctx: AppContext, category: Category, rawName: string): void {
  let name: string;
  try {
    name = sanitizeCategoryName(rawName);
  } catch (error) {
    ctx.state.setStatus(errorMessage(error), 'error', ctx.now());
    return;
  }
  if (name === category.name) return;

  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'rename category',
    work: () => storage.renameCategory(category.id, name),
    toEvent: (): AppEvent => ({ type: 'category_updated', category: { ...category, name }, change: 'renamed' }),
  });
}

// The cycle check runs against memory first; storage checks again against what it holds
export function moveCategory(ctx: AppContext, category: Category, parentId: string | null): void {
  const { state } = ctx;
  if (category.parent_id === parentId) return;
  if (wouldCreateCycle(state.categories, category.id, parentId)) {
    state.setStatus('A category cannot be moved into itself or one of its subcategories', 'error', ctx.now());
    return;
  }

  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'move category',
    work: () => storage.moveCategory(category.id, parentId),
    toEvent: (): AppEvent => ({ type: 'category_updated', category: { ...category, parent_id: parentId }, change: 'moved' }),
  });
}

export function moveFeed(ctx: AppContext, feed: Feed, categoryId: string | null): void {
  if (feed.category_id === categoryId) return;
  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'move feed',
    work: () => storage.moveFeedToCategory(feed.id, categoryId),
    toEvent: (): AppEvent => ({ type: 'feed_moved', feedId: feed.id, categoryId, title: feed.title }),
  });
}

export function toggleCollapsed(ctx: AppContext, category: Category): void {
  const collapsed = !category.collapsed;
  ctx.state.categories = ctx.state.categories.map(c => (c.id === category.id ? { ...c, collapsed } : c));
  ctx.state.clampCursors();

  const { storage } = ctx;
  ctx.pool.spawn({
    tag: 'collapse category',
    work: () => storage.setCategoryCollapsed(category.id, collapsed),
    toEvent: (): AppEvent => ({ type: 'category_collapsed', categoryId: category.id, collapsed }),
  });
}

export function openInBrowser(ctx: AppContext, article: Article): void {
  const url = article.url;
  if (!url) {
    ctx.state.setStatus('Article has no link', 'error', ctx.now());
    return;
  }
  ctx.pool.spawn({
    tag: 'open browser',
    work: () => ctx.openUrl(url),
    toEvent: (): AppEvent => ({ type: 'notice', message: 'Opened in browser' }),
  });
}
