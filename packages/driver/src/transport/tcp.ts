import { once } from 'node:events';
import net, { type Server, type Socket } from 'node:net';
import { logger } from '@libp2p/logger';
import { Inbox } from '../channel/inbox.js';
import type { ChannelKind } from '../channel/kinds.js';
import { encodeFrame, FrameDecoder } from '../protocol/framing.js';
import type { InboundEndpoint, OutboundEndpoint, Transport } from './interface.js';
import { withTimeout } from './timeout.js';

const log = logger('peerwire:transport:tcp');

/** Inbound endpoints listen on every interface and advertise the start() host. */
const ANY_HOST = '0.0.0.0';
const ADDRESS_PATTERN = /^tcp:\/\/(\[[^\]]+\]|[^:/]+):(\d+)$/;

export interface TcpAddress {
  host: string;
  port: number;
}

/** Parses `tcp://<host>:<port>`. IPv6 hosts are written in brackets. */
export function parseTcpAddress(address: string): TcpAddress {
  const match = ADDRESS_PATTERN.exec(address);
  if (!match) {
    throw new Error(`Invalid tcp address: ${address}`);
  }
  const port = Number(match[2]);
  if (port < 1 || port > 65_535) {
    throw new Error(`Invalid port in tcp address: ${address}`);
  }
  return { host: match[1].replace(/^\[|\]$/g, ''), port };
}

export function formatTcpAddress(host: string, port: number): string {
  return host.includes(':') ? `tcp://[${host}]:${port}` : `tcp://${host}:${port}`;
}

function remoteOf(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
}

class TcpInboundEndpoint implements InboundEndpoint {
  readonly kind: ChannelKind;
  readonly address: string;
  readonly inbox: Inbox;
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private closed = false;

  constructor(kind: ChannelKind, address: string, server: Server, inbox: Inbox) {
    this.kind = kind;
    this.address = address;
    this.server = server;
    this.inbox = inbox;
    this.server.on('connection', (socket) => this.accept(socket));
    this.server.on('error', (error) => {
      log.error('%s endpoint %s failed: %s', kind, address, error.message);
      this.inbox.fail(error);
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.inbox.close();
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => {
      this.server.close((error) => {
        if (error) {
          log('closing %s: %s', this.address, error.message);
        }
        resolve();
      });
    });
  }

  private accept(socket: Socket): void {
    const remote = remoteOf(socket);
    const decoder = new FrameDecoder();
    this.sockets.add(socket);
    log('%s endpoint %s accepted %s', this.kind, this.address, remote);

    socket.on('data', (chunk: Buffer) => {
      let frames: Uint8Array[];
      try {
        frames = decoder.push(chunk);
      } catch (error) {
        log.error('dropping connection from %s: %s', remote, error);
        socket.destroy();
        return;
      }
      for (const frame of frames) {
        this.inbox.push(frame);
      }
    });
    socket.on('error', (error) => {
      log.error('connection from %s failed: %s', remote, error.message);
    });
    socket.on('close', () => {
      this.sockets.delete(socket);
    });
  }
}

class TcpOutboundEndpoint implements OutboundEndpoint {
  readonly address: string;
  private readonly socket: Socket;
  private failure: Error | undefined;
  private closing: Promise<void> | undefined;

  constructor(address: string, socket: Socket) {
    this.address = address;
    this.socket = socket;
    this.socket.on('error', (error) => {
      this.failure ??= error;
      log.error('connection to %s failed: %s', address, error.message);
    });
    this.socket.on('close', () => {
      this.failure ??= new Error(`Connection to ${address} is closed`);
    });
  }

  async write(frame: Uint8Array, timeoutMs: number): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.socket.writableNeedDrain) {
      await withTimeout(timeoutMs, `Write to ${this.address}`, async (signal) => {
        await once(this.socket, 'drain', { signal });
      });
    }
    this.socket.write(encodeFrame(frame));
  }

  close(): Promise<void> {
    if (this.socket.destroyed) {
      return Promise.resolve();
    }
    // Flush queued frames before tearing the socket down.
    this.closing ??= new Promise<void>((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end(() => this.socket.destroy());
    });
    return this.closing;
  }
}

/** Endpoints over plain TCP sockets carrying length-prefixed frames. */
export class TcpTransport implements Transport {
  readonly protocol = 'tcp';
  private host: string | undefined;
  private readonly endpoints = new Set<InboundEndpoint | OutboundEndpoint>();

  async start(host: string): Promise<void> {
    this.host = host;
  }

  async stop(): Promise<void> {
    const endpoints = [...this.endpoints];
    this.endpoints.clear();
    await Promise.all(endpoints.map((endpoint) => endpoint.close()));
  }

  async bind(kind: ChannelKind): Promise<InboundEndpoint> {
    if (this.host === undefined) {
      throw new Error('TcpTransport not started: call start() before bind()');
    }
    const server = net.createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen({ host: ANY_HOST, port: 0 }, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const bound = server.address();
    if (bound === null || typeof bound === 'string') {
      server.close();
      throw new Error(`Unexpected bound address for ${kind} endpoint: ${String(bound)}`);
    }

    const address = formatTcpAddress(this.host, bound.port);
    const endpoint = new TcpInboundEndpoint(kind, address, server, new Inbox(kind));
    this.endpoints.add(endpoint);
    return endpoint;
  }

  async connect(address: string, _kind: ChannelKind, timeoutMs: number): Promise<OutboundEndpoint> {
    const { host, port } = parseTcpAddress(address);
    const socket = net.createConnection({ host, port });
    socket.setNoDelay(true);
    try {
      await withTimeout(timeoutMs, `Connect to ${address}`, async (signal) => {
        await once(socket, 'connect', { signal });
      });
    } catch (error) {
      socket.destroy();
      throw error;
    }
    log('connected to %s', address);

    const endpoint = new TcpOutboundEndpoint(address, socket);
    this.endpoints.add(endpoint);
    return endpoint;
  }
}
