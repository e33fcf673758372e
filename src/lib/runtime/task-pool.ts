import { toAppError, type AppError, type ErrorKind } from '../errors';
import { log } from '../log';
import type { EventChannel } from './channel';

export interface TaskSpec<R, E> {
  // Identifies the task in logs and in the fallback failure event
  tag: string;
  work: () => Promise<R>;
  toEvent: (result: R) => E;
  // Builds the event for a thrown error; the pool's fallback is used when absent
  onError?: (error: AppError) => E;
  // How an untyped throwable is classified
  errorKind?: ErrorKind;
}

/**
 * Spawn-and-notify executor. Each spawned task runs independently of the
 * event loop and sends exactly one event into the channel when it settles.
 * Tasks never see application state.
 */
export class TaskPool<E> {
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly channel: EventChannel<E>,
    private readonly onTaskFailed: (tag: string, error: AppError) => E
  ) {}

  get active(): number {
    return this.running;
  }

  spawn<R>(task: TaskSpec<R, E>): void {
    this.running++;
    void this.execute(task).finally(() => this.settle());
  }

  idle(): Promise<void> {
    if (this.running === 0) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private async execute<R>(task: TaskSpec<R, E>): Promise<void> {
    let event: E;
    try {
      const result = await task.work();
      event = task.toEvent(result);
    } catch (err) {
      const error = toAppError(err, task.errorKind ?? 'storage');
      log.warn('tasks', `Task ${task.tag} failed: ${error.message}`, { kind: error.kind });
      event = this.failureEvent(task, error);
    }

    if (!this.channel.send(event)) {
      log.debug('tasks', `Dropped result of ${task.tag} (receiver closed)`);
    }
  }

  private failureEvent<R>(task: TaskSpec<R, E>, error: AppError): E {
    if (!task.onError) return this.onTaskFailed(task.tag, error);
    try {
      return task.onError(error);
    } catch (err) {
      return this.onTaskFailed(task.tag, toAppError(err, 'storage'));
    }
  }

  private settle(): void {
    this.running--;
    if (this.running === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }
}
