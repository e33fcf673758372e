import { spawn } from 'child_process';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { parseArgs } from 'util';
import type { AppEvent } from '@/types';
import type { AppContext } from '@/lib/app/context';
import { EventLoop } from '@/lib/app/loop';
import { ApplicationState } from '@/lib/app/state';
import { config } from '@/lib/config';
import { ContentExtractor } from '@/lib/content/extractor';
import { openDatabase } from '@/lib/db';
import { postgresStorage, type Storage } from '@/lib/db/storage';
import { errorMessage } from '@/lib/errors';
import { fetchFeedDocument } from '@/lib/feeds/fetcher';
import { countFeeds, decodeOpml, encodeOpml } from '@/lib/feeds/opml';
import { parseFeedDocument } from '@/lib/feeds/parser';
import { buildOpmlTree, importOpml, type FeedSource } from '@/lib/feeds/subscriptions';
import { sleep } from '@/lib/feeds/utils';
import { configureLogging, consoleSink, fileSink, log, silentSink } from '@/lib/log';
import { RefreshCoordinator } from '@/lib/refresh/coordinator';
import { EventChannel } from '@/lib/runtime/channel';
import { TaskPool } from '@/lib/runtime/task-pool';
import { ScreenRenderer } from '@/lib/ui/render';
import { TerminalInput } from '@/lib/ui/terminal';

const USAGE = `Usage: feedterm [options]

Options:
  --import <file>   Import subscriptions from an OPML file before starting
  --export <file>   Write subscriptions to an OPML file and exit
  --reset-db        Drop and recreate all tables before starting
  -h, --help        Show this help

Environment:
  POSTGRES_URL              Database connection string (required)
  JINA_API_KEY              API key for the article reader service
  REFRESH_INTERVAL_MINUTES  Refresh all feeds periodically (0 = off)
  FEEDTERM_LOG_FILE         Write logs here while the UI is running

Keys:
  j/k, arrows   Move          tab         Switch pane
  enter, l      Open          esc, h      Back
  r             Refresh all, or retry the article in the reader
  R             Refresh feed
  /             Search        a           Subscribe
  s             Star          m           Mark read/unread
  o             Open link     d d         Delete
  e             Rename        v ... v     Move to category
  I             Reading stats
  q             Quit
`;

function openUrl(url: string): Promise<void> {
  const command = process.platform === 'darwin' ? 'open' : process.platform === 'win32' ? 'explorer' : 'xdg-open';
  return new Promise((resolvePromise, reject) => {
    const child = spawn(command, [url], { stdio: 'ignore', detached: true });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolvePromise();
    });
  });
}

// Subscribing may fetch a web page first, so it gets the tighter page limits
const feedSource: FeedSource = {
  fetchDocument: url => fetchFeedDocument(url, {
    timeoutMs: config.discoveryTimeoutMs,
    maxBytes: config.maxDiscoveryBytes,
  }),
  parseFeed: parseFeedDocument,
};

async function runImport(storage: Storage, file: string): Promise<void> {
  const xml = readFileSync(file, 'utf-8');
  const outlines = await decodeOpml(xml);
  const summary = await importOpml(storage, outlines);
  console.log(`Imported ${summary.feeds} feeds in ${summary.categories} categories from ${file} (${countFeeds(outlines)} in file)`);
}

async function runExport(storage: Storage, file: string): Promise<void> {
  const [categories, feeds] = await Promise.all([storage.listCategories(), storage.listFeeds()]);
  writeFileSync(file, encodeOpml(buildOpmlTree(categories, feeds)));
  console.log(`Exported ${feeds.length} feeds to ${file}`);
}

async function runInterface(storage: Storage): Promise<void> {
  const [categories, feeds, articles] = await Promise.all([
    storage.listCategories(),
    storage.listFeeds(),
    storage.listArticles('all'),
  ]);

  const state = new ApplicationState();
  state.load(categories, feeds, articles);

  const channel = new EventChannel<AppEvent>();
  const pool = new TaskPool<AppEvent>(channel, (task, error) => ({ type: 'task_failed', task, error }));
  const coordinator = new RefreshCoordinator({
    storage,
    channel,
    pool,
    fetchFeed: url => fetchFeedDocument(url),
    parseFeed: parseFeedDocument,
  });

  const ctx: AppContext = {
    state,
    storage,
    channel,
    pool,
    coordinator,
    extractor: new ContentExtractor({ apiKey: config.jinaApiKey, baseUrl: config.jinaBaseUrl }),
    feedSource,
    openUrl,
    now: () => Date.now(),
    options: {
      markReadOnOpen: config.markReadOnOpen,
      refreshIntervalMinutes: config.refreshIntervalMinutes,
      statusTtlMs: config.statusTtlMs,
      searchDebounceMs: config.searchDebounceMs,
      maxSearchLength: config.maxSearchLength,
      tickMs: config.tickMs,
    },
  };

  const onSignal = (signal: NodeJS.Signals) => {
    channel.send({ type: 'shutdown', reason: signal });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // The terminal belongs to the UI from here on
  configureLogging({ sink: config.logFile ? fileSink(config.logFile) : silentSink });

  const input = new TerminalInput();
  const renderer = new ScreenRenderer();
  renderer.start();
  try {
    await new EventLoop(ctx, input, renderer).run();
  } finally {
    input.close();
    renderer.stop();
    channel.close();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    configureLogging({ sink: consoleSink });
  }

  await Promise.race([pool.idle(), sleep(config.shutdownGraceMs)]);
  if (pool.active > 0) {
    log.info('cli', `Exiting with ${pool.active} background tasks still running`);
  }
}

async function main(): Promise<number> {
  const envPath = resolve(process.cwd(), '.env.local');
  if (existsSync(envPath)) {
    process.loadEnvFile(envPath);
  }

  const { values } = parseArgs({
    options: {
      import: { type: 'string' },
      export: { type: 'string' },
      'reset-db': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  configureLogging({ level: config.logLevel, sink: consoleSink });

  await openDatabase({ reset: values['reset-db'] });
  const storage = postgresStorage;

  const staleCount = await storage.markStaleRefreshLogs();
  if (staleCount > 0) {
    console.log(`Marked ${staleCount} interrupted refresh log(s) as failed`);
  }

  if (values.import) {
    await runImport(storage, values.import);
  }

  if (values.export) {
    await runExport(storage, values.export);
    return 0;
  }

  await runInterface(storage);
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error(`feedterm: ${errorMessage(error)}`);
    process.exit(1);
  });
