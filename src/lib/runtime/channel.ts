/**
 * Unbounded multi-producer, single-consumer FIFO queue.
 *
 * Background tasks `send` outcomes. A `recv()` that loses a race stays
 * registered and still gets the next message, so a receiver that races
 * should wait on `ready()` and take messages with `tryRecv()` instead.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiters: Array<(value: T | undefined) => void> = [];
  private readyWaiters: Array<() => void> = [];
  private closed = false;

  send(message: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.queue.push(message);
      this.notifyReady();
    }
    return true;
  }

  /**
   * Resolves once a message is queued or the channel is closed. Takes
   * nothing off the queue.
   */
  ready(): Promise<void> {
    if (this.queue.length > 0 || this.closed) return Promise.resolve();
    return new Promise(resolve => {
      this.readyWaiters.push(resolve);
    });
  }

  tryRecv(): T | undefined {
    return this.queue.shift();
  }

  recv(): Promise<T | undefined> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
    this.notifyReady();
  }

  private notifyReady(): void {
    for (const resolve of this.readyWaiters.splice(0)) resolve();
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
