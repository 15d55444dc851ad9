import type { OutboundEndpoint } from '../transport/interface.js';

/**
 * The outbound broadcast endpoint: one write goes to every subscriber. With no
 * subscriber a write succeeds and the frame goes nowhere.
 */
export class BroadcastFanOut {
  private readonly subscribers: OutboundEndpoint[] = [];

  get size(): number {
    return this.subscribers.length;
  }

  get addresses(): string[] {
    return this.subscribers.map((subscriber) => subscriber.address);
  }

  subscribe(endpoint: OutboundEndpoint): void {
    this.subscribers.push(endpoint);
  }

  /**
   * Writes the frame to every subscriber. Healthy subscribers get the frame even
   * when others fail; the failures are then thrown together.
   */
  async write(frame: Uint8Array, timeoutMs: number): Promise<void> {
    const results = await Promise.allSettled(
      this.subscribers.map((subscriber) => subscriber.write(frame, timeoutMs)),
    );
    const failed: string[] = [];
    const errors: unknown[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failed.push(this.subscribers[index].address);
        errors.push(result.reason);
      }
    });
    if (errors.length > 0) {
      throw new AggregateError(errors, `Broadcast failed for ${failed.join(', ')}`);
    }
  }

  async close(): Promise<void> {
    const subscribers = this.subscribers.splice(0);
    await Promise.all(subscribers.map((subscriber) => subscriber.close()));
  }
}
