import type { AppEvent, Feed, ParsedFeed, RefreshTally, RefreshTrigger } from '@/types';
import { config } from '../config';
import type { Storage } from '../db/storage';
import { StorageError, errorMessage, toAppError } from '../errors';
import { log } from '../log';
import type { EventChannel } from '../runtime/channel';
import { Semaphore } from '../runtime/semaphore';
import type { TaskPool } from '../runtime/task-pool';
import { RefreshLogger } from './logger';

export interface RefreshDeps {
  storage: Storage;
  channel: EventChannel<AppEvent>;
  pool: TaskPool<AppEvent>;
  fetchFeed: (url: string) => Promise<string>;
  parseFeed: (xml: string) => Promise<ParsedFeed>;
  maxConcurrent?: number;
  circuitBreakerThreshold?: number;
  now?: () => Date;
  createLogger?: (trigger: RefreshTrigger) => RefreshLogger;
}

export interface RefreshBatch {
  batchId: number;
  total: number;
  skipped: number;
}

async function storageCall<T>(what: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof StorageError) throw error;
    throw new StorageError(`${what}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Fans a refresh out over feeds with a fixed number of concurrent fetches.
 * Each feed reports a `feed_fetched` event as soon as it settles; the batch
 * reports `refresh_complete` after the last one.
 *
 * A feed that is already being refreshed by an earlier batch is skipped, so
 * at most one refresh commits for a feed at a time.
 */
export class RefreshCoordinator {
  private readonly slots: Semaphore;
  private readonly inFlight = new Set<string>();
  private nextBatchId = 1;

  constructor(private readonly deps: RefreshDeps) {
    this.slots = new Semaphore(deps.maxConcurrent ?? config.maxConcurrentFetches);
  }

  isRefreshing(feedId: string): boolean {
    return this.inFlight.has(feedId);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  refresh(feeds: Feed[], trigger: RefreshTrigger): RefreshBatch {
    const batchId = this.nextBatchId++;
    const threshold = this.deps.circuitBreakerThreshold ?? config.circuitBreakerThreshold;
    const tally: RefreshTally = {
      batchId,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      networkFailures: 0,
      newArticles: 0,
    };

    const eligible: Feed[] = [];
    const trippedTitles: string[] = [];
    for (const feed of feeds) {
      if (this.inFlight.has(feed.id)) {
        tally.skipped++;
        continue;
      }
      // A single-feed refresh is an explicit request and always tries
      if (trigger !== 'single' && feed.consecutive_failures >= threshold) {
        tally.skipped++;
        trippedTitles.push(feed.title);
        continue;
      }
      this.inFlight.add(feed.id);
      eligible.push(feed);
    }

    this.deps.pool.spawn({
      tag: `refresh#${batchId}`,
      work: () => this.runBatch(eligible, trigger, tally, trippedTitles),
      toEvent: (result): AppEvent => ({ type: 'refresh_complete', tally: result }),
      onError: (): AppEvent => ({ type: 'refresh_complete', tally }),
    });

    return { batchId, total: eligible.length, skipped: tally.skipped };
  }

  private async runBatch(
    feeds: Feed[],
    trigger: RefreshTrigger,
    tally: RefreshTally,
    trippedTitles: string[]
  ): Promise<RefreshTally> {
    const logger = this.deps.createLogger?.(trigger) ?? new RefreshLogger(this.deps.storage, trigger);
    await logger.init();
    logger.log('start', `Refreshing ${feeds.length} feeds`, { batchId: tally.batchId, skipped: tally.skipped });
    for (const title of trippedTitles) {
      logger.warn('skip', `Skipping ${title}: too many consecutive failures`);
    }

    await Promise.all(feeds.map(feed => this.slots.run(() => this.refreshFeed(feed, tally, logger))));

    logger.log('complete', `Refresh complete: ${tally.succeeded} ok, ${tally.failed} failed`, {
      newArticles: tally.newArticles,
    });
    await logger.persist(tally.failed > 0 && tally.succeeded === 0 && feeds.length > 0 ? 'error' : 'success', tally);
    log.info('refresh', `Batch ${tally.batchId} finished`, { ...tally });
    return tally;
  }

  private async refreshFeed(feed: Feed, tally: RefreshTally, logger: RefreshLogger): Promise<void> {
    const { storage } = this.deps;
    let event: AppEvent;

    try {
      const xml = await this.deps.fetchFeed(feed.url);
      const parsed = await this.deps.parseFeed(xml);
      const newArticles = await storageCall('Failed to store articles', () =>
        storage.upsertArticles(feed.id, parsed.articles)
      );
      const fetchedAt = (this.deps.now?.() ?? new Date()).toISOString();
      await storageCall('Failed to record fetch', () => storage.recordFeedSuccess(feed.id, fetchedAt));
      const articles = await storageCall('Failed to load articles', () => storage.listArticles(feed.id));

      tally.succeeded++;
      tally.newArticles += newArticles;
      logger.log('fetch', `${feed.title}: ${parsed.articles.length} entries, ${newArticles} new`);
      event = {
        type: 'feed_fetched',
        batchId: tally.batchId,
        feedId: feed.id,
        outcome: { ok: true, articles, newArticles, fetchedAt },
      };
    } catch (err) {
      const error = toAppError(err, 'network');
      tally.failed++;
      if (error.kind === 'network') tally.networkFailures++;
      logger.error('fetch', `${feed.title}: ${error.message}`, { url: feed.url, kind: error.kind });

      try {
        await storage.recordFeedFailure(feed.id, error.message);
      } catch (recordError) {
        log.warn('refresh', `Could not record failure for ${feed.url}: ${errorMessage(recordError)}`);
      }

      event = {
        type: 'feed_fetched',
        batchId: tally.batchId,
        feedId: feed.id,
        outcome: { ok: false, error },
      };
    } finally {
      this.inFlight.delete(feed.id);
    }

    if (!this.deps.channel.send(event)) {
      log.debug('refresh', `Dropped result for ${feed.url} (receiver closed)`);
    }
  }
}
