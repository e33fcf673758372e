import type { Article, Category, Feed, Focus, StatsData, View } from '@/types';
import { IDLE, initialContentState, type ContentState } from '../content/state';

export type CategoryRow =
  | { kind: 'all'; depth: 0 }
  | { kind: 'uncategorized'; depth: 0 }
  | { kind: 'category'; category: Category; depth: number };

export type StatusLevel = 'info' | 'error';

export interface StatusMessage {
  text: string;
  level: StatusLevel;
  at: number;
}

export interface RefreshProgress {
  done: number;
  total: number;
}

export type Prompt =
  | { mode: 'search' | 'subscribe'; buffer: string }
  | { mode: 'rename'; buffer: string; categoryId: string };

// Category or feed picked up with `v`, waiting for a target category
export interface MoveSelection {
  kind: 'category' | 'feed';
  id: string;
  name: string;
}

// The article open in the reader, timed for reading history
export interface ReadingSession {
  // Sequence number matching the session to its `reading_session_opened` event
  id: number;
  articleId: string;
  feedId: string;
  openedAt: number;
  // Storage row id, known once the open has been recorded
  historyId: string | null;
}

export interface SearchState {
  query: string;
  generation: number;
  // Time of the last edit; the query runs once the debounce window passes
  editedAt: number | null;
  results: Article[] | null;
}

/**
 * Flatten the category forest into display rows, depth-first. Children of a
 * collapsed category are hidden. Categories whose parent chain loops never
 * reach a root and are listed at the top level instead of being lost.
 */
export function buildCategoryTree(categories: Category[]): CategoryRow[] {
  const rows: CategoryRow[] = [{ kind: 'all', depth: 0 }];
  const byParent = new Map<string | null, Category[]>();
  const known = new Set(categories.map(c => c.id));

  for (const category of categories) {
    const parent = category.parent_id && known.has(category.parent_id) ? category.parent_id : null;
    const siblings = byParent.get(parent) ?? [];
    siblings.push(category);
    byParent.set(parent, siblings);
  }
  for (const siblings of byParent.values()) {
    siblings.sort((a, b) => a.name.localeCompare(b.name));
  }

  const placed = new Set<string>();
  const walk = (category: Category, depth: number, visible: boolean) => {
    if (placed.has(category.id)) return;
    placed.add(category.id);
    if (visible) rows.push({ kind: 'category', category, depth });
    for (const child of byParent.get(category.id) ?? []) {
      walk(child, depth + 1, visible && !category.collapsed);
    }
  };

  for (const root of byParent.get(null) ?? []) walk(root, 0, true);
  for (const category of categories) {
    if (!placed.has(category.id)) walk(category, 0, true);
  }

  rows.push({ kind: 'uncategorized', depth: 0 });
  return rows;
}

// Ids of a category and everything nested below it
function descendantIds(categories: Category[], rootId: string): Set<string> {
  const ids = new Set<string>([rootId]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const category of categories) {
      if (category.parent_id && ids.has(category.parent_id) && !ids.has(category.id)) {
        ids.add(category.id);
        grew = true;
      }
    }
  }
  return ids;
}

/**
 * Everything the UI shows. Owned by the event loop: background tasks never
 * touch it, they send events that the loop applies here.
 */
export class ApplicationState {
  view: View = 'browse';
  focus: Focus = 'feeds';

  categories: Category[] = [];
  feeds: Feed[] = [];
  articlesByFeed = new Map<string, Article[]>();

  categoryCursor = 0;
  feedCursor = 0;
  articleCursor = 0;

  search: SearchState | null = null;
  searchGeneration = 0;

  readerArticleId: string | null = null;
  readerScroll = 0;
  contentStates = new Map<string, ContentState>();
  contentGeneration = 0;

  readingSession: ReadingSession | null = null;
  readingSessionSeq = 0;
  // Durations of sessions closed before their row id arrived, by session id
  unsavedReadings = new Map<number, number>();
  // null while the stats view is loading
  stats: StatsData | null = null;

  status: StatusMessage | null = null;
  refreshProgress = new Map<number, RefreshProgress>();
  prompt: Prompt | null = null;
  pendingDelete: string | null = null;
  moving: MoveSelection | null = null;

  // Feeds removed during this session; late refresh results for them are ignored
  deletedFeeds = new Set<string>();

  quit = false;
  dirty = true;
  spinnerFrame = 0;
  lastAutoRefreshAt: number;

  constructor(now: number = Date.now()) {
    this.lastAutoRefreshAt = now;
  }

  load(categories: Category[], feeds: Feed[], articles: Article[]): void {
    this.categories = categories;
    this.feeds = feeds;
    this.articlesByFeed.clear();
    for (const article of articles) {
      const list = this.articlesByFeed.get(article.feed_id) ?? [];
      list.push(article);
      this.articlesByFeed.set(article.feed_id, list);
    }
    this.dirty = true;
  }

  categoryRows(): CategoryRow[] {
    return buildCategoryTree(this.categories);
  }

  selectedCategoryRow(): CategoryRow {
    const rows = this.categoryRows();
    return rows[Math.min(this.categoryCursor, rows.length - 1)];
  }

  visibleFeeds(): Feed[] {
    const row = this.selectedCategoryRow();
    if (row.kind === 'all') return this.feeds;
    if (row.kind === 'uncategorized') {
      const known = new Set(this.categories.map(c => c.id));
      return this.feeds.filter(f => f.category_id === null || !known.has(f.category_id));
    }
    const ids = descendantIds(this.categories, row.category.id);
    return this.feeds.filter(f => f.category_id !== null && ids.has(f.category_id));
  }

  selectedFeed(): Feed | undefined {
    return this.visibleFeeds()[this.feedCursor];
  }

  visibleArticles(): Article[] {
    if (this.search?.results) return this.search.results;
    const feed = this.selectedFeed();
    return feed ? this.articlesByFeed.get(feed.id) ?? [] : [];
  }

  selectedArticle(): Article | undefined {
    return this.visibleArticles()[this.articleCursor];
  }

  findArticle(articleId: string): Article | undefined {
    for (const list of this.articlesByFeed.values()) {
      const found = list.find(a => a.id === articleId);
      if (found) return found;
    }
    return this.search?.results?.find(a => a.id === articleId);
  }

  readerArticle(): Article | undefined {
    return this.readerArticleId ? this.findArticle(this.readerArticleId) : undefined;
  }

  contentState(article: Article): ContentState {
    return this.contentStates.get(article.id) ?? initialContentState(article);
  }

  setContentState(articleId: string, state: ContentState): void {
    if (state === IDLE) {
      this.contentStates.delete(articleId);
    } else {
      this.contentStates.set(articleId, state);
    }
  }

  nextContentGeneration(): number {
    this.contentGeneration += 1;
    return this.contentGeneration;
  }

  moveCursor(delta: number): void {
    switch (this.focus) {
      case 'categories': {
        const max = this.categoryRows().length - 1;
        this.categoryCursor = clamp(this.categoryCursor + delta, 0, max);
        this.feedCursor = 0;
        this.articleCursor = 0;
        break;
      }
      case 'feeds': {
        const max = this.visibleFeeds().length - 1;
        this.feedCursor = clamp(this.feedCursor + delta, 0, max);
        this.articleCursor = 0;
        break;
      }
      case 'articles': {
        const max = this.visibleArticles().length - 1;
        this.articleCursor = clamp(this.articleCursor + delta, 0, max);
        break;
      }
    }
  }

  // Keep cursors inside their lists after the lists change underneath them
  clampCursors(): void {
    this.categoryCursor = clamp(this.categoryCursor, 0, this.categoryRows().length - 1);
    this.feedCursor = clamp(this.feedCursor, 0, this.visibleFeeds().length - 1);
    this.articleCursor = clamp(this.articleCursor, 0, this.visibleArticles().length - 1);
  }

  setStatus(text: string, level: StatusLevel, now: number): void {
    this.status = { text, level, at: now };
    this.dirty = true;
  }

  // Returns true when a message was cleared
  expireStatus(now: number, ttlMs: number): boolean {
    if (this.status && now - this.status.at >= ttlMs) {
      this.status = null;
      this.dirty = true;
      return true;
    }
    return false;
  }

  /**
   * Replace a feed's article list with a fresh read from storage. Flags and
   * extracted content already in memory win: a toggle made after that read
   * is newer than the row it returned.
   */
  setFeedArticles(feedId: string, articles: Article[]): void {
    const current = new Map((this.articlesByFeed.get(feedId) ?? []).map(a => [a.id, a]));
    this.articlesByFeed.set(feedId, articles.map(article => {
      const known = current.get(article.id);
      if (!known) return article;
      return {
        ...article,
        is_read: known.is_read,
        is_starred: known.is_starred,
        content: article.content ?? known.content,
      };
    }));
    this.recountUnread(feedId);
  }

  updateFeed(feedId: string, patch: Partial<Feed>): void {
    this.feeds = this.feeds.map(f => (f.id === feedId ? { ...f, ...patch } : f));
  }

  upsertFeed(feed: Feed): void {
    const exists = this.feeds.some(f => f.id === feed.id);
    this.feeds = exists
      ? this.feeds.map(f => (f.id === feed.id ? feed : f))
      : [...this.feeds, feed].sort((a, b) => a.title.toLowerCase().localeCompare(b.title.toLowerCase()));
    this.deletedFeeds.delete(feed.id);
  }

  removeFeed(feedId: string): void {
    const removed = new Set((this.articlesByFeed.get(feedId) ?? []).map(a => a.id));
    this.feeds = this.feeds.filter(f => f.id !== feedId);
    this.articlesByFeed.delete(feedId);
    this.deletedFeeds.add(feedId);
    for (const id of removed) this.contentStates.delete(id);
    if (this.search?.results) {
      this.search.results = this.search.results.filter(a => a.feed_id !== feedId);
    }
    if (this.readingSession?.feedId === feedId) {
      // Its history rows go with the feed
      this.readingSession = null;
    }
    if (this.readerArticleId && removed.has(this.readerArticleId)) {
      this.readerArticleId = null;
      this.view = 'browse';
    }
    this.clampCursors();
  }

  updateCategory(categoryId: string, patch: Partial<Pick<Category, 'name' | 'parent_id'>>): void {
    this.categories = this.categories.map(c => (c.id === categoryId ? { ...c, ...patch } : c));
    this.clampCursors();
  }

  removeCategory(categoryId: string): void {
    const removed = this.categories.find(c => c.id === categoryId);
    if (!removed) return;
    this.categories = this.categories
      .filter(c => c.id !== categoryId)
      .map(c => (c.parent_id === categoryId ? { ...c, parent_id: removed.parent_id } : c));
    this.feeds = this.feeds.map(f => (f.category_id === categoryId ? { ...f, category_id: null } : f));
    this.clampCursors();
  }

  /**
   * Set a read/starred flag on every in-memory copy of an article.
   * Returns the previous value, or undefined when the article is unknown.
   */
  setArticleFlag(articleId: string, flag: 'read' | 'starred', value: boolean): boolean | undefined {
    const key = flag === 'read' ? 'is_read' : 'is_starred';
    let previous: boolean | undefined;
    let feedId: string | undefined;

    for (const [id, list] of this.articlesByFeed) {
      const index = list.findIndex(a => a.id === articleId);
      if (index < 0) continue;
      previous = list[index][key];
      feedId = id;
      list[index] = withFlag(list[index], flag, value);
    }
    if (this.search?.results) {
      this.search.results = this.search.results.map(a => {
        if (a.id !== articleId) return a;
        previous ??= a[key];
        return withFlag(a, flag, value);
      });
    }

    if (feedId) this.recountUnread(feedId);
    this.dirty = true;
    return previous;
  }

  private recountUnread(feedId: string): void {
    const articles = this.articlesByFeed.get(feedId) ?? [];
    const unread = articles.filter(a => !a.is_read).length;
    this.updateFeed(feedId, { unread_count: unread });
  }
}

function withFlag(article: Article, flag: 'read' | 'starred', value: boolean): Article {
  return flag === 'read' ? { ...article, is_read: value } : { ...article, is_starred: value };
}

function clamp(value: number, min: number, max: number): number {
  if (max < min) return min;
  return Math.max(min, Math.min(max, value));
}
