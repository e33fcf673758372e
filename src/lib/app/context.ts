import type { AppEvent } from '@/types';
import type { Storage } from '../db/storage';
import type { FeedSource } from '../feeds/subscriptions';
import type { RefreshCoordinator } from '../refresh/coordinator';
import type { EventChannel } from '../runtime/channel';
import type { TaskPool } from '../runtime/task-pool';
import type { ApplicationState } from './state';

export interface Extractor {
  extract(url: string): Promise<string>;
}

export interface LoopOptions {
  markReadOnOpen: boolean;
  refreshIntervalMinutes: number;
  statusTtlMs: number;
  searchDebounceMs: number;
  maxSearchLength: number;
  tickMs: number;
}

// What command and event handlers may use. Only the loop holds one.
export interface AppContext {
  state: ApplicationState;
  storage: Storage;
  channel: EventChannel<AppEvent>;
  pool: TaskPool<AppEvent>;
  coordinator: RefreshCoordinator;
  extractor: Extractor;
  feedSource: FeedSource;
  openUrl: (url: string) => Promise<void>;
  now: () => number;
  options: LoopOptions;
}
