import { describe, it, expect } from 'vitest';
import { EventLoop, type Renderer } from '@/lib/app/loop';
import type { ApplicationState } from '@/lib/app/state';
import type { InputSource, KeyPress } from '@/lib/ui/terminal';
import { createTestContext, seedState } from './support/app-context';

// Replays keys in order; afterwards either ends the input or waits forever
class ScriptedInput implements InputSource {
  closed = false;

  constructor(private readonly keys: KeyPress[], private readonly endWhenEmpty = true) {}

  next(): Promise<KeyPress | undefined> {
    const key = this.keys.shift();
    if (key) return Promise.resolve(key);
    return this.endWhenEmpty ? Promise.resolve(undefined) : new Promise<KeyPress | undefined>(() => {});
  }

  close(): void {
    this.closed = true;
  }
}

// Hands out one pending key wait at a time; the test decides when it resolves
class ManualInput implements InputSource {
  private pending: ((key: KeyPress | undefined) => void) | null = null;

  next(): Promise<KeyPress | undefined> {
    return new Promise(resolve => {
      this.pending = resolve;
    });
  }

  press(key: KeyPress): void {
    const resolve = this.pending;
    if (!resolve) throw new Error('no key wait pending');
    this.pending = null;
    resolve(key);
  }

  get waiting(): boolean {
    return this.pending !== null;
  }

  close(): void {}
}

async function until(condition: () => boolean): Promise<void> {
  while (!condition()) await new Promise(resolve => setTimeout(resolve, 1));
}

class RecordingRenderer implements Renderer {
  frames: Array<{ feedCursor: number; status: string | null }> = [];

  constructor(private readonly onRender: (state: ApplicationState) => void = () => {}) {}

  render(state: ApplicationState): void {
    this.frames.push({ feedCursor: state.feedCursor, status: state.status?.text ?? null });
    this.onRender(state);
  }
}

describe('EventLoop', () => {
  it('applies keys in order and stops on quit', async () => {
    const test = createTestContext();
    await seedState(test, { 'Feed A': ['One'], 'Feed B': ['Two'] });
    const renderer = new RecordingRenderer();

    await new EventLoop(test.ctx, new ScriptedInput([{ sequence: 'j' }, { sequence: 'q' }]), renderer).run();

    expect(test.ctx.state.quit).toBe(true);
    expect(renderer.frames.map(f => f.feedCursor)).toEqual([0, 1]);
  });

  it('quits when the input ends', async () => {
    const test = createTestContext();
    await new EventLoop(test.ctx, new ScriptedInput([]), new RecordingRenderer()).run();
    expect(test.ctx.state.quit).toBe(true);
  });

  it('drains queued background events before waiting', async () => {
    const test = createTestContext();
    test.ctx.channel.send({ type: 'notice', message: 'queued' });
    test.ctx.channel.send({ type: 'shutdown', reason: 'test' });
    const renderer = new RecordingRenderer();

    await new EventLoop(test.ctx, new ScriptedInput([], false), renderer).run();

    expect(test.ctx.state.quit).toBe(true);
    expect(test.ctx.state.status?.text).toBe('queued');
    expect(renderer.frames).toEqual([]);
  });

  it('renders events that arrive while it waits', async () => {
    const test = createTestContext();
    const { channel } = test.ctx;
    const renderer = new RecordingRenderer(state => {
      if (state.status?.text === 'from a task') channel.send({ type: 'shutdown', reason: 'test' });
    });
    setTimeout(() => channel.send({ type: 'notice', message: 'from a task' }), 5);

    await new EventLoop(test.ctx, new ScriptedInput([], false), renderer).run();

    expect(renderer.frames.map(f => f.status)).toEqual([null, 'from a task']);
  });

  it('expires the status on a tick', async () => {
    const test = createTestContext({ now: () => Date.now(), options: { tickMs: 5, statusTtlMs: 0 } });
    const { state, channel } = test.ctx;
    state.setStatus('hello', 'info', Date.now());
    const renderer = new RecordingRenderer(current => {
      if (current.status === null) channel.send({ type: 'shutdown', reason: 'test' });
    });

    await new EventLoop(test.ctx, new ScriptedInput([], false), renderer).run();

    expect(renderer.frames.map(f => f.status)).toEqual(['hello', null]);
  });

  it('applies events in send order when a key wins the same turn', async () => {
    const test = createTestContext();
    const { state, channel } = test.ctx;
    const input = new ManualInput();
    const renderer = new RecordingRenderer();
    const done = new EventLoop(test.ctx, input, renderer).run();

    await until(() => input.waiting);
    input.press({ sequence: 'x' });
    channel.send({ type: 'notice', message: 'A' });
    channel.send({ type: 'notice', message: 'B' });
    await until(() => renderer.frames.some(f => f.status === 'B'));
    channel.send({ type: 'shutdown', reason: 'test' });
    await done;

    const statuses = renderer.frames.map(f => f.status);
    expect(statuses).not.toContain('A');
    expect(state.status?.text).toBe('B');
  });

  it('keeps order across several turns of keys and events', async () => {
    const test = createTestContext();
    await seedState(test, { 'Feed A': ['One'], 'Feed B': ['Two'], 'Feed C': ['Three'] });
    const { state, channel } = test.ctx;
    const input = new ManualInput();
    const seen: string[] = [];
    const renderer = new RecordingRenderer(current => {
      if (current.status && seen[seen.length - 1] !== current.status.text) seen.push(current.status.text);
    });
    const done = new EventLoop(test.ctx, input, renderer).run();

    for (const message of ['1', '2', '3']) {
      await until(() => input.waiting);
      input.press({ sequence: 'j' });
      channel.send({ type: 'notice', message });
    }
    await until(() => seen.includes('3'));
    channel.send({ type: 'shutdown', reason: 'test' });
    await done;

    expect(seen).toEqual(['1', '2', '3']);
    expect(state.feedCursor).toBe(2);
  });

  it('stops when the event channel closes', async () => {
    const test = createTestContext();
    test.ctx.channel.close();
    await new EventLoop(test.ctx, new ScriptedInput([], false), new RecordingRenderer()).run();
    expect(test.ctx.state.quit).toBe(true);
  });
});
