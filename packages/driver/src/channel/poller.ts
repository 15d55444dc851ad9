import { setImmediate } from 'node:timers/promises';
import type { Inbox } from './inbox.js';

/**
 * Waits on several inboxes at once. `poll` reports the inboxes holding frames
 * in registration order, so the first registered inbox wins ties.
 */
export class Poller {
  private readonly inboxes: Inbox[] = [];

  register(inbox: Inbox): void {
    if (!this.inboxes.includes(inbox)) {
      this.inboxes.push(inbox);
    }
  }

  /**
   * Resolves with the ready inboxes once at least one has a frame, or with an
   * empty list when `timeoutMs` elapses first (`-1` waits forever). With `0`
   * and nothing ready, pending I/O and timers get one turn of the event loop
   * before the inboxes are checked again. Rejects when a registered inbox has
   * failed or closed.
   */
  async poll(timeoutMs: number): Promise<Inbox[]> {
    this.throwIfBroken();
    if (this.ready().length === 0) {
      if (timeoutMs === 0) {
        await setImmediate();
      } else {
        await this.waitForActivity(timeoutMs);
      }
      this.throwIfBroken();
    }
    return this.ready();
  }

  private ready(): Inbox[] {
    return this.inboxes.filter((inbox) => inbox.size > 0);
  }

  private throwIfBroken(): void {
    for (const inbox of this.inboxes) {
      if (inbox.error) {
        throw inbox.error;
      }
      if (inbox.isClosed) {
        throw new Error(`The ${inbox.kind} endpoint is closed`);
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      let unwatchers: Array<() => void> = [];
      const wake = (): void => {
        clearTimeout(timer);
        for (const unwatch of unwatchers) {
          unwatch();
        }
        resolve();
      };
      unwatchers = this.inboxes.map((inbox) => inbox.watch(wake));
      if (timeoutMs > 0) {
        timer = setTimeout(wake, timeoutMs);
      }
    });
  }
}
