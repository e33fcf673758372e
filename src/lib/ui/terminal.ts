import { emitKeypressEvents } from 'readline';
import { EventChannel } from '../runtime/channel';

// Shape of readline's keypress `key` argument
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export interface InputSource {
  // Resolves to undefined once input has ended
  next(): Promise<KeyPress | undefined>;
  close(): void;
}

/**
 * Key presses from a TTY in raw mode, queued so none are lost while the
 * loop is busy with something else.
 */
export class TerminalInput implements InputSource {
  private readonly keys = new EventChannel<KeyPress>();
  private readonly onKeypress = (str: string | undefined, key: KeyPress | undefined) => {
    this.keys.send(key ?? { sequence: str, name: str });
  };
  private readonly onEnd = () => this.keys.close();

  constructor(private readonly stream: NodeJS.ReadStream = process.stdin) {
    emitKeypressEvents(stream);
    if (stream.isTTY) stream.setRawMode(true);
    stream.on('keypress', this.onKeypress);
    stream.on('end', this.onEnd);
    stream.resume();
  }

  next(): Promise<KeyPress | undefined> {
    return this.keys.recv();
  }

  close(): void {
    this.stream.off('keypress', this.onKeypress);
    this.stream.off('end', this.onEnd);
    if (this.stream.isTTY) this.stream.setRawMode(false);
    this.stream.pause();
    this.keys.close();
  }
}
