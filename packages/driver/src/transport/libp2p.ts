import { createLibp2p } from 'libp2p';
import { tcp } from '@libp2p/tcp';
import { noise } from '@chainsafe/libp2p-noise';
import { yamux } from '@chainsafe/libp2p-yamux';
import { identify } from '@libp2p/identify';
import { logger } from '@libp2p/logger';
import { multiaddr } from '@multiformats/multiaddr';
import type { Libp2p } from 'libp2p';
import type { Stream } from '@libp2p/interface';
import { Inbox } from '../channel/inbox.js';
import { ChannelKind } from '../channel/kinds.js';
import { encodeFrame, FrameDecoder } from '../protocol/framing.js';
import type { InboundEndpoint, OutboundEndpoint, Transport } from './interface.js';
import { withTimeout } from './timeout.js';

const log = logger('peerwire:transport:libp2p');

/** One stream protocol per inbound channel kind. */
export const STREAM_PROTOCOLS: Record<ChannelKind, string> = {
  [ChannelKind.UnicastInbound]: '/peerwire/unicast/1.0.0',
  [ChannelKind.BroadcastInbound]: '/peerwire/broadcast/1.0.0',
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

class Libp2pOutboundEndpoint implements OutboundEndpoint {
  readonly address: string;
  private readonly stream: Stream;
  private closed = false;

  constructor(address: string, stream: Stream) {
    this.address = address;
    this.stream = stream;
  }

  async write(frame: Uint8Array, timeoutMs: number): Promise<void> {
    if (this.closed) {
      throw new Error(`Libp2pTransport: stream to ${this.address} is closed`);
    }
    const drained = this.stream.send(encodeFrame(frame));
    if (!drained) {
      await withTimeout(timeoutMs, `Write to ${this.address}`, (signal) =>
        this.stream.onDrain({ signal }),
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.stream.close();
  }
}

/**
 * P2P transport using libp2p (TCP + Noise + Yamux). Both inbound endpoints of a
 * driver share one libp2p node and are told apart by stream protocol, so their
 * advertised addresses are the same multiaddr. Every outbound endpoint is one
 * long-lived stream.
 */
export class Libp2pTransport implements Transport {
  readonly protocol = 'libp2p';
  private node: Libp2p | undefined;
  private readonly endpoints = new Set<InboundEndpoint | OutboundEndpoint>();

  async start(host: string): Promise<void> {
    if (this.node) {
      return;
    }
    this.node = await createLibp2p({
      addresses: {
        listen: [`/ip4/${host}/tcp/0`],
      },
      transports: [tcp()],
      connectionEncrypters: [noise()],
      streamMuxers: [yamux()],
      services: {
        identify: identify(),
      },
    });
    await this.node.start();
    log('libp2p node %s started', this.node.peerId.toString());
  }

  async stop(): Promise<void> {
    const endpoints = [...this.endpoints];
    this.endpoints.clear();
    await Promise.all(endpoints.map((endpoint) => endpoint.close()));
    if (this.node) {
      await this.node.stop();
      this.node = undefined;
    }
  }

  /** Get the multiaddrs the node is listening on. */
  getMultiaddrs(): string[] {
    return this.requireNode()
      .getMultiaddrs()
      .map((ma) => ma.toString());
  }

  async bind(kind: ChannelKind): Promise<InboundEndpoint> {
    const node = this.requireNode();
    const address = node.getMultiaddrs()[0]?.toString();
    if (address === undefined) {
      throw new Error('Libp2pTransport: node has no listen address');
    }

    const protocol = STREAM_PROTOCOLS[kind];
    const inbox = new Inbox(kind);
    await node.handle(protocol, (stream, connection) => {
      this.readStream(stream, connection.remotePeer.toString(), inbox);
    });

    let closed = false;
    const endpoint: InboundEndpoint = {
      kind,
      address,
      inbox,
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        inbox.close();
        await node.unhandle(protocol);
      },
    };
    this.endpoints.add(endpoint);
    return endpoint;
  }

  async connect(address: string, kind: ChannelKind, timeoutMs: number): Promise<OutboundEndpoint> {
    const node = this.requireNode();
    const target = multiaddr(address);
    const stream = await withTimeout(timeoutMs, `Connect to ${address}`, (signal) =>
      node.dialProtocol(target, STREAM_PROTOCOLS[kind], { signal }),
    );
    log('opened %s stream to %s', kind, address);

    const endpoint = new Libp2pOutboundEndpoint(address, stream);
    this.endpoints.add(endpoint);
    return endpoint;
  }

  private requireNode(): Libp2p {
    if (!this.node) {
      throw new Error('Libp2pTransport not started: call start() first');
    }
    return this.node;
  }

  private readStream(stream: Stream, remotePeer: string, inbox: Inbox): void {
    const decoder = new FrameDecoder();
    stream.addEventListener('message', (event) => {
      let frames: Uint8Array[];
      try {
        frames = decoder.push(event.data);
      } catch (error) {
        log.error('dropping stream from %s: %s', remotePeer, error);
        stream.abort(toError(error));
        return;
      }
      for (const frame of frames) {
        inbox.push(frame);
      }
    });
  }
}
