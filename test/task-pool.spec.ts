import { describe, it, expect } from 'vitest';
import { EventChannel } from '@/lib/runtime/channel';
import { Semaphore } from '@/lib/runtime/semaphore';
import { TaskPool } from '@/lib/runtime/task-pool';
import { NetworkError, StorageError, type AppError } from '@/lib/errors';

type TestEvent =
  | { type: 'done'; value: number }
  | { type: 'failed'; tag: string; error: AppError }
  | { type: 'custom_failure'; message: string };

function createPool() {
  const channel = new EventChannel<TestEvent>();
  const pool = new TaskPool<TestEvent>(channel, (tag, error) => ({ type: 'failed', tag, error }));
  return { channel, pool };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('TaskPool', () => {
  it('sends exactly one event built from the result', async () => {
    const { channel, pool } = createPool();
    pool.spawn({ tag: 'add', work: async () => 2 + 2, toEvent: value => ({ type: 'done', value }) });

    await pool.idle();
    expect(channel.tryRecv()).toEqual({ type: 'done', value: 4 });
    expect(channel.tryRecv()).toBeUndefined();
  });

  it('turns a thrown error into the fallback failure event', async () => {
    const { channel, pool } = createPool();
    pool.spawn({
      tag: 'boom',
      work: async (): Promise<number> => {
        throw new Error('disk full');
      },
      toEvent: value => ({ type: 'done', value }),
    });

    await pool.idle();
    const event = channel.tryRecv();
    expect(event?.type).toBe('failed');
    if (event?.type !== 'failed') return;
    expect(event.tag).toBe('boom');
    expect(event.error).toBeInstanceOf(StorageError);
    expect(event.error.message).toBe('disk full');
  });

  it('classifies untyped errors with the task error kind', async () => {
    const { channel, pool } = createPool();
    pool.spawn({
      tag: 'fetch',
      errorKind: 'network',
      work: async (): Promise<number> => {
        throw new Error('getaddrinfo ENOTFOUND example.invalid');
      },
      toEvent: value => ({ type: 'done', value }),
    });

    await pool.idle();
    const event = channel.tryRecv();
    if (event?.type !== 'failed') throw new Error('expected failure event');
    expect(event.error).toBeInstanceOf(NetworkError);
    expect(event.error.kind).toBe('network');
  });

  it('uses the task-specific error event when given', async () => {
    const { channel, pool } = createPool();
    pool.spawn({
      tag: 'custom',
      work: async (): Promise<number> => {
        throw new StorageError('locked');
      },
      toEvent: value => ({ type: 'done', value }),
      onError: error => ({ type: 'custom_failure', message: error.message }),
    });

    await pool.idle();
    expect(channel.tryRecv()).toEqual({ type: 'custom_failure', message: 'locked' });
  });

  it('runs tasks independently and reports them as they finish', async () => {
    const { channel, pool } = createPool();
    const slow = deferred<number>();
    pool.spawn({ tag: 'slow', work: () => slow.promise, toEvent: value => ({ type: 'done', value }) });
    pool.spawn({ tag: 'fast', work: async () => 1, toEvent: value => ({ type: 'done', value }) });

    expect(pool.active).toBe(2);
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(channel.tryRecv()).toEqual({ type: 'done', value: 1 });
    expect(pool.active).toBe(1);

    slow.resolve(2);
    await pool.idle();
    expect(channel.tryRecv()).toEqual({ type: 'done', value: 2 });
    expect(pool.active).toBe(0);
  });

  it('drops the event quietly when the channel is closed', async () => {
    const { channel, pool } = createPool();
    channel.close();
    pool.spawn({ tag: 'late', work: async () => 1, toEvent: value => ({ type: 'done', value }) });

    await pool.idle();
    expect(channel.size).toBe(0);
  });
});

describe('Semaphore', () => {
  it('rejects a capacity below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('never runs more than its capacity at once and admits waiters in order', async () => {
    const slots = new Semaphore(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];
    let peak = 0;

    const runs = gates.map((gate, i) =>
      slots.run(async () => {
        started.push(i);
        peak = Math.max(peak, slots.inFlight);
        await gate.promise;
      })
    );

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(started).toEqual([0, 1]);
    expect(slots.queued).toBe(2);

    gates[1].resolve();
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(started).toEqual([0, 1, 2]);

    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();
    await Promise.all(runs);

    expect(started).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
    expect(slots.inFlight).toBe(0);
  });

  it('releases the slot when the work throws', async () => {
    const slots = new Semaphore(1);
    await expect(slots.run(async () => {
      throw new Error('nope');
    })).rejects.toThrow('nope');
    expect(slots.inFlight).toBe(0);
    expect(await slots.run(async () => 'ok')).toBe('ok');
  });
});
