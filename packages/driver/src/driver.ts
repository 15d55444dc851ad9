import { logger } from '@libp2p/logger';
import type { Logger } from '@libp2p/interface';
import { BroadcastFanOut } from './channel/fan-out.js';
import type { Inbox } from './channel/inbox.js';
import { type AddressMap, ChannelKind, isChannelKind, type PeersAddress } from './channel/kinds.js';
import { Poller } from './channel/poller.js';
import {
  DriverError,
  DriverReceiveError,
  DriverSendError,
  PeersConnectionError,
  SocketTypeError,
} from './errors.js';
import { resolveHostAddress } from './host.js';
import { jsonCodec } from './protocol/codec.js';
import type { Message, MessageCodec } from './protocol/types.js';
import { createTransport } from './transport/index.js';
import type { InboundEndpoint, OutboundEndpoint, Transport } from './transport/interface.js';

export const DEFAULT_PROTOCOL = 'tcp';
/** `-1` disables the timeout. */
export const DEFAULT_SEND_TIMEOUT = -1;
/** `-1` disables the timeout. */
export const DEFAULT_RECEIVE_TIMEOUT = -1;

export interface DriverOptions {
  /** Transport protocol: 'tcp' (default), 'inproc' or 'libp2p'. Ignored when `transport` is set. */
  protocol?: string;
  /** Timeout in ms for queueing a message. 0 = fail at once when it cannot be queued, -1 = no timeout. */
  sendTimeout?: number;
  /**
   * Timeout in ms for setting up an outbound endpoint in `connect`. -1 = no
   * timeout. Defaults to `sendTimeout` when that is positive, else -1.
   */
  connectTimeout?: number;
  /** Timeout in ms of each wait for inbound data. -1 = no timeout. */
  receiveTimeout?: number;
  /** Host advertised in this driver's addresses. Defaults to the host's reachable IPv4 address. */
  host?: string;
  /** Defaults to the `peerwire:driver` debug logger, silent unless enabled via DEBUG. */
  logger?: Logger;
  codec?: MessageCodec;
  /** Use this transport instead of creating one from `protocol`. */
  transport?: Transport;
}

/** Outcome of `send` and `broadcast`. Failures are returned, never thrown. */
export type SendResult = { sent: true } | { sent: false; error: DriverSendError };

interface DriverSettings {
  sendTimeout: number;
  connectTimeout: number;
  receiveTimeout: number;
  codec: MessageCodec;
  log: Logger;
}

function validateTimeout(name: string, value: number): number {
  if (!Number.isInteger(value) || value < -1) {
    throw new RangeError(`${name} must be a non-negative integer or -1, got ${value}`);
  }
  return value;
}

function sendFailure(error: DriverSendError): SendResult {
  return { sent: false, error };
}

/**
 * Messaging driver. Exchanges messages with named peers by unicast (one
 * dedicated outbound endpoint per peer) and broadcast (one outbound endpoint
 * fanning out to every subscribed peer), and receives both kinds through a
 * single stream.
 *
 * Setup errors (`create`, `connect`) are thrown; send errors are returned as a
 * SendResult so that steady-state traffic never throws.
 */
export class Driver {
  private readonly transport: Transport;
  private readonly unicastReceiver: InboundEndpoint;
  private readonly broadcastReceiver: InboundEndpoint;
  private readonly broadcastSender: BroadcastFanOut;
  private readonly unicastSenders = new Map<string, OutboundEndpoint>();
  private readonly poller = new Poller();
  private readonly settings: DriverSettings;
  private closed = false;

  private constructor(
    transport: Transport,
    unicastReceiver: InboundEndpoint,
    broadcastSender: BroadcastFanOut,
    broadcastReceiver: InboundEndpoint,
    settings: DriverSettings,
  ) {
    this.transport = transport;
    this.unicastReceiver = unicastReceiver;
    this.broadcastSender = broadcastSender;
    this.broadcastReceiver = broadcastReceiver;
    this.settings = settings;

    // Registration order decides ties: unicast is served before broadcast.
    this.poller.register(unicastReceiver.inbox);
    this.poller.register(broadcastReceiver.inbox);
  }

  /**
   * Create a driver and bind its two inbound endpoints on OS-assigned ports.
   * Rejects when a port cannot be bound; nothing stays bound in that case.
   */
  static async create(options: DriverOptions = {}): Promise<Driver> {
    const sendTimeout = validateTimeout('sendTimeout', options.sendTimeout ?? DEFAULT_SEND_TIMEOUT);
    const receiveTimeout = validateTimeout(
      'receiveTimeout',
      options.receiveTimeout ?? DEFAULT_RECEIVE_TIMEOUT,
    );
    const connectTimeout = validateTimeout(
      'connectTimeout',
      options.connectTimeout ?? (sendTimeout > 0 ? sendTimeout : -1),
    );
    const log = options.logger ?? logger('peerwire:driver');
    const transport = options.transport ?? createTransport(options.protocol ?? DEFAULT_PROTOCOL);
    const host = options.host ?? resolveHostAddress();

    try {
      await transport.start(host);
      const unicastReceiver = await transport.bind(ChannelKind.UnicastInbound);
      log('receiving unicast messages at %s', unicastReceiver.address);
      const broadcastSender = new BroadcastFanOut();
      const broadcastReceiver = await transport.bind(ChannelKind.BroadcastInbound);
      log('subscribed to broadcast messages at %s', broadcastReceiver.address);

      return new Driver(transport, unicastReceiver, broadcastSender, broadcastReceiver, {
        sendTimeout,
        connectTimeout,
        receiveTimeout,
        codec: options.codec ?? jsonCodec,
        log,
      });
    } catch (error) {
      await transport.stop();
      throw error;
    }
  }

  /** This driver's inbound addresses, to be handed to peers by the discovery layer. */
  get address(): AddressMap {
    return {
      [ChannelKind.UnicastInbound]: this.unicastReceiver.address,
      [ChannelKind.BroadcastInbound]: this.broadcastReceiver.address,
    };
  }

  get protocol(): string {
    return this.transport.protocol;
  }

  /** Names of the peers reachable by unicast, in connection order. */
  get peers(): string[] {
    return [...this.unicastSenders.keys()];
  }

  /**
   * Connect to every peer in the address map. A unicast address gets its own
   * outbound endpoint (replacing any earlier one for that peer); a broadcast
   * address becomes one more subscriber of the broadcast endpoint.
   *
   * Not transactional: on failure the peers processed before the failing one
   * stay connected.
   *
   * @throws {SocketTypeError} when a peer lists an unknown channel kind; nothing
   * is connected for that peer
   * @throws {PeersConnectionError} when an endpoint cannot connect
   */
  async connect(peersAddress: PeersAddress): Promise<void> {
    if (this.closed) {
      throw new DriverError('Driver is closed');
    }

    for (const [peer, addresses] of Object.entries(peersAddress)) {
      for (const kind of Object.keys(addresses)) {
        if (!isChannelKind(kind)) {
          throw new SocketTypeError(kind, peer);
        }
      }

      for (const [kind, address] of Object.entries(addresses)) {
        try {
          if (kind === ChannelKind.UnicastInbound) {
            await this.connectUnicast(peer, address);
          } else {
            const endpoint = await this.transport.connect(
              address,
              ChannelKind.BroadcastInbound,
              this.settings.connectTimeout,
            );
            this.broadcastSender.subscribe(endpoint);
            this.settings.log('connected to %s via broadcasting', peer);
          }
        } catch (error) {
          throw new PeersConnectionError(peer, error);
        }
      }
    }
  }

  /**
   * Receive messages from both inbound endpoints as they arrive. Each wait lasts
   * up to the receive timeout and is retried silently when it elapses. When both
   * endpoints hold data, unicast is served first.
   *
   * With `continuous` false, at most one message is yielded. The sequence also
   * ends when the driver is closed.
   *
   * @throws {DriverReceiveError} when an inbound endpoint fails
   */
  async *receive(continuous = true): AsyncGenerator<Message, void, undefined> {
    while (!this.closed) {
      let ready: Inbox[];
      try {
        ready = await this.poller.poll(this.settings.receiveTimeout);
      } catch (error) {
        if (this.closed) {
          return;
        }
        throw new DriverReceiveError(error);
      }

      const inbox = ready[0];
      if (!inbox) {
        continue;
      }
      const frame = inbox.shift();
      if (!frame) {
        continue;
      }

      let message: Message;
      try {
        message = this.settings.codec.decode(frame);
      } catch (error) {
        this.settings.log.error('dropping undecodable %s frame: %s', inbox.kind, error);
        continue;
      }
      this.settings.log('received a message from %s via %s', message.source, inbox.kind);

      yield message;

      if (!continuous) {
        return;
      }
    }
  }

  /** Send a message to the peer named by its `destination`. */
  async send(message: Message): Promise<SendResult> {
    if (this.closed) {
      return sendFailure(new DriverSendError('Driver is closed'));
    }
    const endpoint = this.unicastSenders.get(message.destination);
    if (!endpoint) {
      return sendFailure(
        new DriverSendError(`No unicast connection to peer "${message.destination}"`),
      );
    }

    try {
      await endpoint.write(this.settings.codec.encode(message), this.settings.sendTimeout);
    } catch (error) {
      return sendFailure(
        new DriverSendError(`Failure to send message to ${message.destination}`, error),
      );
    }
    this.settings.log('sent a %s message to %s', message.tag, message.destination);
    return { sent: true };
  }

  /** Send a message to every subscribed peer. */
  async broadcast(message: Message): Promise<SendResult> {
    if (this.closed) {
      return sendFailure(new DriverSendError('Driver is closed'));
    }

    try {
      await this.broadcastSender.write(this.settings.codec.encode(message), this.settings.sendTimeout);
    } catch (error) {
      return sendFailure(new DriverSendError('Failure to broadcast message', error));
    }
    this.settings.log(
      'broadcast a %s message to %d subscribers',
      message.tag,
      this.broadcastSender.size,
    );
    return { sent: true };
  }

  /** Close every endpoint and release the transport. Pending receives end. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const senders = [...this.unicastSenders.values()];
    this.unicastSenders.clear();
    await Promise.all([
      ...senders.map((sender) => sender.close()),
      this.broadcastSender.close(),
      this.unicastReceiver.close(),
      this.broadcastReceiver.close(),
    ]);
    await this.transport.stop();
    this.settings.log('driver closed');
  }

  private async connectUnicast(peer: string, address: string): Promise<void> {
    const endpoint = await this.transport.connect(
      address,
      ChannelKind.UnicastInbound,
      this.settings.connectTimeout,
    );
    const previous = this.unicastSenders.get(peer);
    this.unicastSenders.set(peer, endpoint);
    if (previous) {
      await previous.close();
    }
    this.settings.log('connected to %s via unicasting', peer);
  }
}
