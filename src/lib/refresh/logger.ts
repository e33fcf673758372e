import type { LogEvent, RefreshTally, RefreshTrigger } from '@/types';
import type { Storage } from '../db/storage';
import { errorMessage } from '../errors';
import { log } from '../log';

/**
 * Collects the events of one refresh batch and writes them to
 * `refresh_logs` when the batch completes. Persistence failures are
 * logged and not rethrown.
 */
export class RefreshLogger {
  private events: LogEvent[] = [];
  private startTime: number;
  private logId: string | null = null;

  constructor(
    private storage: Storage,
    private trigger: RefreshTrigger
  ) {
    this.startTime = Date.now();
  }

  async init(): Promise<void> {
    try {
      this.logId = await this.storage.createRefreshLog(this.trigger);
    } catch (error) {
      log.warn('refresh', `Could not create refresh log: ${errorMessage(error)}`);
    }
  }

  log(phase: string, message: string, data?: Record<string, unknown>) {
    this.addEvent('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>) {
    this.addEvent('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>) {
    this.addEvent('error', phase, message, data);
  }

  private addEvent(level: LogEvent['level'], phase: string, message: string, data?: Record<string, unknown>) {
    this.events.push({
      timestamp: new Date().toISOString(),
      phase,
      level,
      message,
      ...(data ? { data } : {}),
    });
  }

  async persist(status: 'success' | 'error', tally: RefreshTally, error?: string) {
    if (!this.logId) return;
    const record = { status, durationMs: Date.now() - this.startTime, tally: { ...tally }, events: this.events, error };
    try {
      await this.storage.completeRefreshLog(this.logId, record);
    } catch (err) {
      log.warn('refresh', `Could not persist refresh log: ${errorMessage(err)}`);
    }
  }
}
