import type { Focus } from '@/types';
import { log } from '../log';
import type { KeyPress } from '../ui/terminal';
import {
  deleteCategory,
  deleteFeed,
  endReadingSession,
  loadContent,
  moveCategory,
  moveFeed,
  openArticle,
  openInBrowser,
  renameCategory,
  runSearch,
  setFlag,
  showStats,
  startRefresh,
  subscribe,
  toggleCollapsed,
} from './actions';
import type { AppContext } from './context';
import type { MoveSelection } from './state';

export type Command =
  | { type: 'quit' }
  | { type: 'move'; delta: number }
  | { type: 'toggle_focus' }
  | { type: 'open' }
  | { type: 'back' }
  | { type: 'search' }
  | { type: 'refresh_all' }
  | { type: 'refresh_feed' }
  | { type: 'retry_content' }
  | { type: 'subscribe' }
  | { type: 'delete' }
  | { type: 'rename' }
  | { type: 'move_pick' }
  | { type: 'toggle_star' }
  | { type: 'toggle_read' }
  | { type: 'open_browser' }
  | { type: 'stats' }
  | { type: 'prompt_input'; text: string }
  | { type: 'prompt_backspace' }
  | { type: 'prompt_submit' }
  | { type: 'prompt_cancel' }
  | { type: 'unknown'; key: string };

const FOCUS_ORDER: Focus[] = ['categories', 'feeds', 'articles'];

function describeKey(key: KeyPress): string {
  return `${key.ctrl ? 'C-' : ''}${key.name ?? key.sequence ?? '?'}`;
}

function isPrintable(sequence: string | undefined): sequence is string {
  return typeof sequence === 'string' && sequence.length === 1 && sequence >= ' ' && sequence !== '\x7f';
}

/**
 * Map a key press to a command. While a prompt is open, printable keys edit
 * its text instead of triggering commands.
 */
export function decodeKey(key: KeyPress, mode: { prompt: boolean; reader: boolean }): Command {
  if (key.ctrl && key.name === 'c') return { type: 'quit' };

  if (mode.prompt) {
    switch (key.name) {
      case 'return':
      case 'enter':
        return { type: 'prompt_submit' };
      case 'escape':
        return { type: 'prompt_cancel' };
      case 'backspace':
        return { type: 'prompt_backspace' };
    }
    if (!key.ctrl && !key.meta && isPrintable(key.sequence)) {
      return { type: 'prompt_input', text: key.sequence };
    }
    return { type: 'unknown', key: describeKey(key) };
  }

  switch (key.name) {
    case 'down':
      return { type: 'move', delta: 1 };
    case 'up':
      return { type: 'move', delta: -1 };
    case 'pagedown':
      return { type: 'move', delta: 10 };
    case 'pageup':
      return { type: 'move', delta: -10 };
    case 'tab':
      return { type: 'toggle_focus' };
    case 'return':
    case 'enter':
      return { type: 'open' };
    case 'escape':
    case 'backspace':
    case 'left':
      return { type: 'back' };
  }

  switch (key.sequence) {
    case 'q':
      return { type: 'quit' };
    case 'j':
      return { type: 'move', delta: 1 };
    case 'k':
      return { type: 'move', delta: -1 };
    case 'l':
      return { type: 'open' };
    case 'h':
      return { type: 'back' };
    case '/':
      return { type: 'search' };
    case 'r':
      return mode.reader ? { type: 'retry_content' } : { type: 'refresh_all' };
    case 'R':
      return { type: 'refresh_feed' };
    case 'a':
      return { type: 'subscribe' };
    case 'd':
      return { type: 'delete' };
    case 'e':
      return { type: 'rename' };
    case 'v':
      return { type: 'move_pick' };
    case 's':
      return { type: 'toggle_star' };
    case 'm':
      return { type: 'toggle_read' };
    case 'o':
      return { type: 'open_browser' };
    case 'I':
      return { type: 'stats' };
  }

  return { type: 'unknown', key: describeKey(key) };
}

export function handleKey(ctx: AppContext, key: KeyPress): void {
  const { state } = ctx;
  const command = decodeKey(key, { prompt: state.prompt !== null, reader: state.view === 'reader' });
  handleCommand(ctx, command);
}

// Article the current command applies to: the one open in the reader, else the selection
function targetArticle(ctx: AppContext) {
  const { state } = ctx;
  return state.view === 'reader' ? state.readerArticle() : state.selectedArticle();
}

export function handleCommand(ctx: AppContext, command: Command): void {
  const { state } = ctx;

  if (command.type === 'unknown') {
    log.debug('input', `Unbound key ${command.key}`);
    return;
  }
  state.dirty = true;

  // A delete needs two presses in a row
  const pendingDelete = state.pendingDelete;
  state.pendingDelete = null;

  // The stats panel covers the panes and only closes
  if (state.view === 'stats' && command.type !== 'quit' && command.type !== 'back') return;

  switch (command.type) {
    case 'quit':
      endReadingSession(ctx);
      state.quit = true;
      return;

    case 'move':
      if (state.view === 'reader') {
        state.readerScroll = Math.max(0, state.readerScroll + command.delta);
      } else {
        state.moveCursor(command.delta);
      }
      return;

    case 'toggle_focus': {
      if (state.view === 'reader') return;
      const index = FOCUS_ORDER.indexOf(state.focus);
      state.focus = FOCUS_ORDER[(index + 1) % FOCUS_ORDER.length];
      return;
    }

    case 'open': {
      if (state.view === 'reader') return;
      if (state.focus === 'categories') {
        const row = state.selectedCategoryRow();
        // Enter on a category with subcategories folds it; anywhere else moves on to its feeds
        if (row.kind === 'category' && state.categories.some(c => c.parent_id === row.category.id)) {
          toggleCollapsed(ctx, row.category);
        } else {
          state.focus = 'feeds';
          state.feedCursor = 0;
        }
        return;
      }
      if (state.focus === 'feeds') {
        state.focus = 'articles';
        state.articleCursor = 0;
        return;
      }
      const article = state.selectedArticle();
      if (article) openArticle(ctx, article);
      return;
    }

    case 'back':
      if (state.view === 'stats') {
        state.view = 'browse';
        state.stats = null;
      } else if (state.moving) {
        state.moving = null;
        state.setStatus('Move cancelled', 'info', ctx.now());
      } else if (state.view === 'reader') {
        endReadingSession(ctx);
        state.view = 'browse';
        state.readerArticleId = null;
        state.readerScroll = 0;
      } else if (state.search) {
        state.search = null;
        state.articleCursor = 0;
      } else if (state.focus === 'articles') {
        state.focus = 'feeds';
      } else if (state.focus === 'feeds') {
        state.focus = 'categories';
      }
      return;

    case 'search': {
      if (state.view === 'reader') return;
      const search = state.search ?? { query: '', generation: state.searchGeneration, editedAt: null, results: null };
      state.search = search;
      state.prompt = { mode: 'search', buffer: search.query };
      state.focus = 'articles';
      return;
    }

    case 'subscribe':
      state.prompt = { mode: 'subscribe', buffer: '' };
      return;

    case 'prompt_input': {
      const prompt = state.prompt;
      if (!prompt) return;
      if (prompt.mode === 'search' && prompt.buffer.length >= ctx.options.maxSearchLength) return;
      prompt.buffer += command.text;
      syncSearchFromPrompt(ctx);
      return;
    }

    case 'prompt_backspace': {
      const prompt = state.prompt;
      if (!prompt) return;
      prompt.buffer = prompt.buffer.slice(0, -1);
      syncSearchFromPrompt(ctx);
      return;
    }

    case 'prompt_submit': {
      const prompt = state.prompt;
      state.prompt = null;
      if (prompt?.mode === 'search') runSearch(ctx);
      if (prompt?.mode === 'subscribe') subscribe(ctx, prompt.buffer);
      if (prompt?.mode === 'rename') {
        const category = state.categories.find(c => c.id === prompt.categoryId);
        if (category) renameCategory(ctx, category, prompt.buffer);
      }
      return;
    }

    case 'prompt_cancel': {
      const prompt = state.prompt;
      state.prompt = null;
      if (prompt?.mode === 'search') {
        state.search = null;
        state.articleCursor = 0;
      }
      return;
    }

    case 'refresh_all':
      startRefresh(ctx, state.feeds, 'manual');
      return;

    case 'refresh_feed': {
      const article = state.view === 'reader' ? state.readerArticle() : undefined;
      const feed = article ? state.feeds.find(f => f.id === article.feed_id) : state.selectedFeed();
      if (feed) startRefresh(ctx, [feed], 'single');
      return;
    }

    case 'retry_content': {
      const article = state.readerArticle();
      if (article) loadContent(ctx, article, true);
      return;
    }

    case 'delete': {
      if (state.view === 'reader') return;
      if (state.focus === 'categories') {
        const row = state.selectedCategoryRow();
        if (row.kind !== 'category') return;
        const key = `category:${row.category.id}`;
        if (pendingDelete === key) {
          deleteCategory(ctx, row.category);
        } else {
          state.pendingDelete = key;
          state.setStatus(`Press d again to delete category ${row.category.name}`, 'info', ctx.now());
        }
        return;
      }
      const feed = state.selectedFeed();
      if (!feed) return;
      const key = `feed:${feed.id}`;
      if (pendingDelete === key) {
        deleteFeed(ctx, feed);
      } else {
        state.pendingDelete = key;
        state.setStatus(`Press d again to delete ${feed.title}`, 'info', ctx.now());
      }
      return;
    }

    case 'rename': {
      if (state.view === 'reader' || state.focus !== 'categories') return;
      const row = state.selectedCategoryRow();
      if (row.kind !== 'category') return;
      state.prompt = { mode: 'rename', buffer: row.category.name, categoryId: row.category.id };
      return;
    }

    case 'move_pick':
      if (state.view === 'reader') return;
      if (state.moving) {
        dropMoving(ctx);
      } else {
        pickUpForMove(ctx);
      }
      return;

    case 'toggle_star': {
      const article = targetArticle(ctx);
      if (article) setFlag(ctx, article, 'starred', !article.is_starred);
      return;
    }

    case 'toggle_read': {
      const article = targetArticle(ctx);
      if (article) setFlag(ctx, article, 'read', !article.is_read);
      return;
    }

    case 'open_browser': {
      const article = targetArticle(ctx);
      if (article) openInBrowser(ctx, article);
      return;
    }

    case 'stats':
      if (state.view === 'browse') showStats(ctx);
      return;
  }
}

function pickUpForMove(ctx: AppContext): void {
  const { state } = ctx;
  let moving: MoveSelection;
  if (state.focus === 'categories') {
    const row = state.selectedCategoryRow();
    if (row.kind !== 'category') return;
    moving = { kind: 'category', id: row.category.id, name: row.category.name };
  } else {
    const feed = state.selectedFeed();
    if (!feed) return;
    moving = { kind: 'feed', id: feed.id, name: feed.title };
    state.focus = 'categories';
  }
  state.moving = moving;
  state.setStatus(`Moving ${moving.name}: pick a category and press v`, 'info', ctx.now());
}

// The category row under the cursor is the target; All and Uncategorized mean none
function dropMoving(ctx: AppContext): void {
  const { state } = ctx;
  const moving = state.moving;
  if (!moving || state.focus !== 'categories') return;
  state.moving = null;

  const row = state.selectedCategoryRow();
  const targetId = row.kind === 'category' ? row.category.id : null;
  if (moving.kind === 'category') {
    const category = state.categories.find(c => c.id === moving.id);
    if (category) moveCategory(ctx, category, targetId);
  } else {
    const feed = state.feeds.find(f => f.id === moving.id);
    if (feed) moveFeed(ctx, feed, targetId);
  }
}

function syncSearchFromPrompt(ctx: AppContext): void {
  const { state } = ctx;
  if (state.prompt?.mode !== 'search' || !state.search) return;
  state.search.query = state.prompt.buffer;
  state.search.editedAt = ctx.now();
}
