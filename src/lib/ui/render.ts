import type { Article, Feed } from '@/types';
import { displayBody } from '../content/state';
import { formatStatsLine } from '../reading/stats';
import type { ApplicationState, CategoryRow, Prompt } from '../app/state';

const SPINNER = ['|', '/', '-', '\\'];

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const ALT_SCREEN_ON = '\x1b[?1049h';
const ALT_SCREEN_OFF = '\x1b[?1049l';

const PROMPT_LABELS: Record<Prompt['mode'], string> = {
  search: 'Search',
  subscribe: 'Subscribe to URL',
  rename: 'Rename category',
};

function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  return text.length > width ? `${text.slice(0, Math.max(0, width - 1))}~` : text;
}

function marker(selected: boolean, focused: boolean): string {
  if (!selected) return '  ';
  return focused ? '> ' : '* ';
}

function categoryLabel(row: CategoryRow): string {
  switch (row.kind) {
    case 'all':
      return 'All feeds';
    case 'uncategorized':
      return 'Uncategorized';
    case 'category':
      return `${'  '.repeat(row.depth)}${row.category.collapsed ? '+' : '-'} ${row.category.name}`;
  }
}

function feedLabel(feed: Feed): string {
  const unread = feed.unread_count > 0 ? ` (${feed.unread_count})` : '';
  const error = feed.last_fetch_error ? ' !' : '';
  return `${feed.title}${unread}${error}`;
}

function articleLabel(article: Article): string {
  const flags = `${article.is_read ? ' ' : 'N'}${article.is_starred ? '*' : ' '}`;
  const date = article.published_at ? article.published_at.slice(0, 10) : '----------';
  return `${flags} ${date} ${article.title}`;
}

function progressText(state: ApplicationState): string | null {
  if (state.refreshProgress.size === 0) return null;
  let done = 0;
  let total = 0;
  for (const progress of state.refreshProgress.values()) {
    done += progress.done;
    total += progress.total;
  }
  return `${SPINNER[state.spinnerFrame % SPINNER.length]} Refreshing (${done}/${total})`;
}

// Keep the cursor on screen: a window of `height` rows around `cursor`
function windowed<T>(items: T[], cursor: number, height: number): { items: T[]; offset: number } {
  if (items.length <= height) return { items, offset: 0 };
  const offset = Math.min(Math.max(0, cursor - Math.floor(height / 2)), items.length - height);
  return { items: items.slice(offset, offset + height), offset };
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    if (paragraph.length === 0) {
      lines.push('');
      continue;
    }
    let rest = paragraph;
    while (rest.length > width) {
      const cut = rest.lastIndexOf(' ', width);
      const at = cut > 0 ? cut : width;
      lines.push(rest.slice(0, at));
      rest = rest.slice(at).trimStart();
    }
    lines.push(rest);
  }
  return lines;
}

function statusLine(state: ApplicationState): string {
  if (state.prompt) {
    const label = PROMPT_LABELS[state.prompt.mode];
    return `${label}: ${state.prompt.buffer}_`;
  }
  const parts: string[] = [];
  const progress = progressText(state);
  if (progress) parts.push(progress);
  if (state.status) parts.push(state.status.level === 'error' ? `[!] ${state.status.text}` : state.status.text);
  return parts.join('  ');
}

function renderReader(state: ApplicationState, width: number, height: number): string[] {
  const article = state.readerArticle();
  if (!article) return ['(article no longer available)'];

  const content = state.contentState(article);
  const header = [truncate(article.title, width), truncate(article.url ?? '', width)];
  if (content.status === 'loading') {
    header.push(`${SPINNER[state.spinnerFrame % SPINNER.length]} Loading full article...`);
  } else if (content.status === 'failed') {
    header.push('(showing summary; r to retry)');
  }
  header.push('');

  const body = wrap(displayBody(content, article), Math.max(20, width));
  const room = Math.max(0, height - header.length);
  const scroll = Math.min(state.readerScroll, Math.max(0, body.length - room));
  return [...header, ...body.slice(scroll, scroll + room)];
}

function renderStats(state: ApplicationState, width: number): string[] {
  const lines = ['Reading stats', ''];
  const data = state.stats;
  if (!data) return [...lines, 'Loading stats...'];

  const empty = [data.today, data.week, data.month].every(s => s.articlesRead === 0 && s.totalMinutes === 0);
  if (empty) {
    return [...lines, 'No reading history yet.', '', 'Start reading articles to see your stats here.'];
  }

  lines.push(
    `  Today:      ${formatStatsLine(data.today)}`,
    `  This week:  ${formatStatsLine(data.week)}`,
    `  This month: ${formatStatsLine(data.month)}`,
    '',
    '  Top feeds (30 days):'
  );
  data.month.topFeeds.slice(0, 5).forEach((feed, i) => {
    lines.push(truncate(`    ${i + 1}. ${feed.title} (${feed.count} article${feed.count === 1 ? '' : 's'})`, width));
  });
  if (data.month.topFeeds.length === 0) lines.push('    (no data)');
  lines.push('', '  Press Esc to close');
  return lines;
}

function renderBrowse(state: ApplicationState, width: number, height: number): string[] {
  const catWidth = Math.max(16, Math.floor(width * 0.2));
  const feedWidth = Math.max(20, Math.floor(width * 0.3));
  const articleWidth = Math.max(20, width - catWidth - feedWidth - 2);

  const rows = state.categoryRows();
  const feeds = state.visibleFeeds();
  const articles = state.visibleArticles();

  const cats = windowed(rows, state.categoryCursor, height);
  const feedWin = windowed(feeds, state.feedCursor, height);
  const articleWin = windowed(articles, state.articleCursor, height);

  const column = <T>(
    win: { items: T[]; offset: number },
    cursor: number,
    focused: boolean,
    label: (item: T) => string,
    colWidth: number
  ): string[] =>
    win.items.map((item, i) =>
      truncate(`${marker(win.offset + i === cursor, focused)}${label(item)}`, colWidth).padEnd(colWidth)
    );

  const catCol = column(cats, state.categoryCursor, state.focus === 'categories', categoryLabel, catWidth);
  const feedCol = column(feedWin, state.feedCursor, state.focus === 'feeds', feedLabel, feedWidth);
  const articleCol = column(articleWin, state.articleCursor, state.focus === 'articles', articleLabel, articleWidth);

  const lines: string[] = [];
  for (let i = 0; i < height; i++) {
    const left = catCol[i] ?? ''.padEnd(catWidth);
    const middle = feedCol[i] ?? ''.padEnd(feedWidth);
    const right = articleCol[i] ?? '';
    lines.push(`${left}|${middle}|${right}`.trimEnd());
  }
  return lines;
}

function renderBody(state: ApplicationState, width: number, height: number): string[] {
  switch (state.view) {
    case 'reader':
      return renderReader(state, width, height);
    case 'stats':
      return renderStats(state, width);
    case 'browse':
      return renderBrowse(state, width, height);
  }
}

/**
 * Lay out one frame as plain text lines: the panes (or the reader), then a
 * status line. `height` counts every line including the status line.
 */
export function renderLines(state: ApplicationState, width: number, height: number): string[] {
  const bodyHeight = Math.max(1, height - 2);
  const title = state.search
    ? truncate(`feedterm - search: ${state.search.query}`, width)
    : 'feedterm';
  const body = renderBody(state, width, bodyHeight);
  return [title, ...body.slice(0, bodyHeight), truncate(statusLine(state), width)];
}

export class ScreenRenderer {
  constructor(private readonly out: NodeJS.WriteStream = process.stdout) {}

  start(): void {
    this.out.write(`${ALT_SCREEN_ON}${HIDE_CURSOR}`);
  }

  stop(): void {
    this.out.write(`${SHOW_CURSOR}${ALT_SCREEN_OFF}`);
  }

  render(state: ApplicationState): void {
    const width = this.out.columns || 100;
    const height = this.out.rows || 30;
    this.out.write(`${CLEAR_SCREEN}${renderLines(state, width, height).join('\n')}`);
  }
}
