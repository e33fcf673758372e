import type { AppEvent, RefreshTally } from '@/types';
import { completeLoad, isLoading } from '../content/state';
import { log } from '../log';
import { endReadingSession, runSearch, saveReadingDuration, startRefresh } from './actions';
import type { AppContext } from './context';

// Share of network failures above which a batch is reported as offline
const OFFLINE_THRESHOLD = 0.8;

function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

export function refreshSummary(tally: RefreshTally): { text: string; level: 'info' | 'error' } {
  const attempted = tally.succeeded + tally.failed;
  if (attempted === 0) {
    return { text: `Nothing refreshed (${tally.skipped} feeds skipped).`, level: 'info' };
  }
  if (tally.networkFailures / attempted > OFFLINE_THRESHOLD) {
    return { text: 'Offline - Network unavailable. Check your connection.', level: 'error' };
  }
  const articles = `${tally.newArticles} new article${tally.newArticles === 1 ? '' : 's'}`;
  if (tally.failed > 0) {
    return {
      text: `Refresh complete. ${articles}, ${tally.failed} feed${tally.failed === 1 ? '' : 's'} failed.`,
      level: 'error',
    };
  }
  return { text: `Refresh complete. ${articles}.`, level: 'info' };
}

/**
 * Apply one background outcome to the state. Results are recorded against
 * the entity they belong to and never switch the view or the article on
 * screen.
 */
export function handleAppEvent(ctx: AppContext, event: AppEvent): void {
  const { state } = ctx;
  state.dirty = true;

  switch (event.type) {
    case 'feed_fetched': {
      const progress = state.refreshProgress.get(event.batchId);
      if (progress) progress.done += 1;

      if (state.deletedFeeds.has(event.feedId) || !state.feeds.some(f => f.id === event.feedId)) {
        log.debug('events', `Ignoring refresh result for removed feed ${event.feedId}`);
        return;
      }

      const { outcome } = event;
      if (outcome.ok) {
        state.setFeedArticles(event.feedId, outcome.articles);
        state.updateFeed(event.feedId, {
          last_fetched_at: outcome.fetchedAt,
          last_fetch_error: null,
          consecutive_failures: 0,
        });
      } else {
        const feed = state.feeds.find(f => f.id === event.feedId);
        state.updateFeed(event.feedId, {
          last_fetch_error: outcome.error.message,
          consecutive_failures: (feed?.consecutive_failures ?? 0) + 1,
        });
      }
      state.clampCursors();
      return;
    }

    case 'refresh_complete': {
      state.refreshProgress.delete(event.tally.batchId);
      const summary = refreshSummary(event.tally);
      state.setStatus(summary.text, summary.level, ctx.now());
      return;
    }

    case 'content_loaded': {
      const article = state.findArticle(event.articleId);
      const current = state.contentStates.get(event.articleId) ?? { status: 'idle' as const };
      const next = completeLoad(current, event.generation, event.outcome, article?.summary ?? null);
      if (!next) {
        log.debug('events', `Dropping stale content result for ${event.articleId}`, { generation: event.generation });
        return;
      }
      state.setContentState(event.articleId, next);
      if (!event.outcome.ok && state.readerArticleId === event.articleId) {
        state.setStatus(`Could not load full article: ${event.outcome.error.message}`, 'error', ctx.now());
      }
      return;
    }

    case 'search_completed': {
      if (!state.search || state.search.generation !== event.generation) {
        log.debug('events', `Dropping stale search results for "${event.query}"`);
        return;
      }
      if (event.outcome.ok) {
        state.search.results = event.outcome.articles;
        state.articleCursor = 0;
      } else {
        state.setStatus(`Search failed: ${event.outcome.error.message}`, 'error', ctx.now());
      }
      return;
    }

    case 'feed_subscribed':
      state.upsertFeed(event.feed);
      state.setStatus(`Subscribed to ${event.feed.title}`, 'info', ctx.now());
      startRefresh(ctx, [event.feed], 'single');
      return;

    case 'feed_subscribe_failed':
      state.setStatus(`Subscribe failed: ${event.error.message}`, 'error', ctx.now());
      return;

    case 'feed_deleted':
      state.removeFeed(event.feedId);
      state.setStatus(`Deleted ${event.title} (${event.articlesRemoved} articles)`, 'info', ctx.now());
      return;

    case 'category_deleted':
      state.removeCategory(event.categoryId);
      state.setStatus(`Deleted category ${event.name}`, 'info', ctx.now());
      return;

    case 'category_updated': {
      if (!state.categories.some(c => c.id === event.category.id)) return;
      const { id, name, parent_id } = event.category;
      state.updateCategory(id, event.change === 'renamed' ? { name } : { parent_id });
      const text = event.change === 'renamed'
        ? `Renamed category to ${event.category.name}`
        : `Moved category ${event.category.name}`;
      state.setStatus(text, 'info', ctx.now());
      return;
    }

    case 'feed_moved':
      if (state.deletedFeeds.has(event.feedId)) return;
      state.updateFeed(event.feedId, { category_id: event.categoryId });
      state.clampCursors();
      state.setStatus(`Moved ${event.title}`, 'info', ctx.now());
      return;

    case 'category_collapsed':
      log.debug('events', `Category ${event.categoryId} collapsed=${event.collapsed}`);
      return;

    case 'flag_saved':
      log.debug('events', `Saved ${event.flag}=${event.value} for ${event.articleId}`);
      return;

    case 'flag_save_failed':
      state.setArticleFlag(event.articleId, event.flag, event.previous);
      state.setStatus(`Could not save ${event.flag} state: ${event.error.message}`, 'error', ctx.now());
      return;

    case 'reading_session_opened': {
      const session = state.readingSession;
      if (session?.id === event.session) {
        session.historyId = event.historyId;
        return;
      }
      // Closed before the row existed: write the parked duration now
      const duration = state.unsavedReadings.get(event.session);
      if (duration !== undefined) {
        state.unsavedReadings.delete(event.session);
        saveReadingDuration(ctx, event.historyId, duration);
      }
      return;
    }

    case 'reading_session_closed':
      log.debug('events', `Recorded ${event.durationSeconds}s of reading for ${event.historyId}`);
      return;

    case 'stats_loaded':
      if (state.view === 'stats') state.stats = event.stats;
      return;

    case 'task_failed':
      state.setStatus(`${event.task} failed: ${event.error.message}`, 'error', ctx.now());
      return;

    case 'notice':
      state.setStatus(event.message, 'info', ctx.now());
      return;

    case 'shutdown':
      log.info('events', `Shutting down: ${event.reason}`);
      endReadingSession(ctx);
      state.quit = true;
      return;

    default:
      assertNever(event);
  }
}

/**
 * Periodic housekeeping: status expiry, spinner, debounced search and
 * auto-refresh.
 */
export function handleTick(ctx: AppContext): void {
  const { state, options } = ctx;
  const now = ctx.now();

  state.expireStatus(now, options.statusTtlMs);

  const busy = state.refreshProgress.size > 0
    || [...state.contentStates.values()].some(s => isLoading(s));
  if (busy) {
    state.spinnerFrame = (state.spinnerFrame + 1) % 4;
    state.dirty = true;
  }

  const search = state.search;
  if (search && search.editedAt !== null && now - search.editedAt >= options.searchDebounceMs) {
    runSearch(ctx);
  }

  if (options.refreshIntervalMinutes > 0 && state.feeds.length > 0 && now - state.lastAutoRefreshAt >= options.refreshIntervalMinutes * 60_000) {
    state.lastAutoRefreshAt = now;
    startRefresh(ctx, state.feeds, 'auto');
  }
}
