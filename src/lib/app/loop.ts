import { errorMessage } from '../errors';
import { log } from '../log';
import type { InputSource, KeyPress } from '../ui/terminal';
import type { AppContext } from './context';
import { handleAppEvent, handleTick } from './events';
import { handleKey } from './input';
import type { ApplicationState } from './state';

export interface Renderer {
  render(state: ApplicationState): void;
}

type Wake =
  | { source: 'input'; key: KeyPress | undefined }
  | { source: 'input_error'; error: unknown }
  | { source: 'channel' }
  | { source: 'tick' };

/**
 * Single-threaded owner of the application state. Each turn services one
 * wake-up (a key, queued background events, or the tick), then redraws if
 * anything changed. Waits that lose a race are kept for the next turn.
 * Background events only ever leave the channel through `tryRecv`, so they
 * are applied in the order they were sent.
 */
export class EventLoop {
  private inputWait: Promise<Wake> | null = null;
  private channelWait: Promise<Wake> | null = null;
  private tickWait: Promise<Wake> | null = null;
  private tickTimer: NodeJS.Timeout | null = null;
  private turn = 0;

  constructor(
    private readonly ctx: AppContext,
    private readonly input: InputSource,
    private readonly renderer: Renderer
  ) {}

  async run(): Promise<void> {
    const { state } = this.ctx;
    log.info('loop', 'Event loop started');

    try {
      while (!state.quit) {
        this.drainChannel();
        if (state.quit) break;
        this.renderIfDirty();

        const wake = await this.nextWake();
        this.dispatch(wake);
      }
    } finally {
      if (this.tickTimer) clearTimeout(this.tickTimer);
      this.tickTimer = null;
      log.info('loop', 'Event loop stopped');
    }
  }

  // Apply queued background results first so typing cannot starve them
  private drainChannel(): void {
    const { state, channel } = this.ctx;
    let event = channel.tryRecv();
    while (event !== undefined) {
      handleAppEvent(this.ctx, event);
      if (state.quit) return;
      event = channel.tryRecv();
    }
  }

  private renderIfDirty(): void {
    const { state } = this.ctx;
    if (!state.dirty) return;
    state.dirty = false;
    this.renderer.render(state);
  }

  private nextWake(): Promise<Wake> {
    this.inputWait ??= this.input.next().then(
      (key): Wake => ({ source: 'input', key }),
      (error: unknown): Wake => ({ source: 'input_error', error })
    );
    this.channelWait ??= this.ctx.channel.ready().then((): Wake => ({ source: 'channel' }));
    this.tickWait ??= new Promise<Wake>(resolve => {
      this.tickTimer = setTimeout(() => resolve({ source: 'tick' }), this.ctx.options.tickMs);
    });

    // Rotate the order so no source wins every tie
    const waits = [this.inputWait, this.channelWait, this.tickWait];
    const offset = this.turn++ % waits.length;
    return Promise.race([...waits.slice(offset), ...waits.slice(0, offset)]);
  }

  private dispatch(wake: Wake): void {
    const { state } = this.ctx;

    switch (wake.source) {
      case 'input':
        this.inputWait = null;
        if (wake.key === undefined) {
          log.info('loop', 'Input closed');
          state.quit = true;
          return;
        }
        handleKey(this.ctx, wake.key);
        return;

      case 'input_error':
        this.inputWait = null;
        log.error('loop', `Input error: ${errorMessage(wake.error)}`);
        state.setStatus(`Input error: ${errorMessage(wake.error)}`, 'error', this.ctx.now());
        return;

      case 'channel':
        this.channelWait = null;
        this.drainChannel();
        if (!state.quit && this.ctx.channel.isClosed && this.ctx.channel.size === 0) {
          log.info('loop', 'Event channel closed');
          state.quit = true;
        }
        return;

      case 'tick':
        this.tickWait = null;
        this.tickTimer = null;
        handleTick(this.ctx);
        return;
    }
  }
}
