import type { ChannelKind } from './kinds.js';

type Watcher = () => void;

/**
 * Receiving side of an inbound endpoint: a FIFO queue of frames that notifies
 * watchers whenever it gains a frame, fails or closes.
 */
export class Inbox {
  readonly kind: ChannelKind;
  private readonly frames: Uint8Array[] = [];
  private readonly watchers = new Set<Watcher>();
  private failure: Error | undefined;
  private closed = false;

  constructor(kind: ChannelKind) {
    this.kind = kind;
  }

  get size(): number {
    return this.frames.length;
  }

  get error(): Error | undefined {
    return this.failure;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(frame: Uint8Array): void {
    if (this.closed) {
      return;
    }
    this.frames.push(frame);
    this.notify();
  }

  shift(): Uint8Array | undefined {
    return this.frames.shift();
  }

  /** Marks the endpoint as broken. The first failure wins. */
  fail(error: Error): void {
    this.failure ??= error;
    this.notify();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.frames.length = 0;
    this.notify();
  }

  /** Calls the watcher on every change until the returned function is called. */
  watch(watcher: Watcher): () => void {
    this.watchers.add(watcher);
    return () => {
      this.watchers.delete(watcher);
    };
  }

  private notify(): void {
    for (const watcher of [...this.watchers]) {
      watcher();
    }
  }
}
