import { randomUUID } from 'node:crypto';
import { Inbox } from '../channel/inbox.js';
import type { ChannelKind } from '../channel/kinds.js';
import type { InboundEndpoint, OutboundEndpoint, Transport } from './interface.js';

interface RegistryEntry {
  kind: ChannelKind;
  inbox: Inbox;
}

const registry = new Map<string, RegistryEntry>();

class LocalOutboundEndpoint implements OutboundEndpoint {
  readonly address: string;
  private closed = false;

  constructor(address: string) {
    this.address = address;
  }

  async write(frame: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error(`LocalTransport: endpoint to ${this.address} is closed`);
    }
    const entry = registry.get(this.address);
    if (!entry) {
      throw new Error(`LocalTransport: endpoint not found: ${this.address}`);
    }
    entry.inbox.push(frame.slice());
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-process transport (`inproc`). All instances in the same process share a
 * static registry of bound endpoints. Useful for unit tests: no ports, no
 * networking, frames are queued on write.
 */
export class LocalTransport implements Transport {
  readonly protocol = 'inproc';
  private readonly endpoints = new Set<InboundEndpoint | OutboundEndpoint>();
  private started = false;

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    const endpoints = [...this.endpoints];
    this.endpoints.clear();
    await Promise.all(endpoints.map((endpoint) => endpoint.close()));
    this.started = false;
  }

  async bind(kind: ChannelKind): Promise<InboundEndpoint> {
    if (!this.started) {
      throw new Error('LocalTransport: cannot bind before start()');
    }
    const address = `inproc://${randomUUID()}`;
    const inbox = new Inbox(kind);
    registry.set(address, { kind, inbox });

    const endpoint: InboundEndpoint = {
      kind,
      address,
      inbox,
      close: async () => {
        registry.delete(address);
        inbox.close();
      },
    };
    this.endpoints.add(endpoint);
    return endpoint;
  }

  async connect(address: string, kind: ChannelKind): Promise<OutboundEndpoint> {
    const entry = registry.get(address);
    if (!entry) {
      throw new Error(`LocalTransport: endpoint not found: ${address}`);
    }
    if (entry.kind !== kind) {
      throw new Error(`LocalTransport: ${address} is a ${entry.kind} endpoint, not ${kind}`);
    }
    const endpoint = new LocalOutboundEndpoint(address);
    this.endpoints.add(endpoint);
    return endpoint;
  }
}
