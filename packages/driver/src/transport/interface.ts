import type { Inbox } from '../channel/inbox.js';
import type { ChannelKind } from '../channel/kinds.js';

/** A bound endpoint that accepts frames from any connected sender. */
export interface InboundEndpoint {
  readonly kind: ChannelKind;
  /** Address peers connect to, in the transport's own format. */
  readonly address: string;
  /** Where received frames are queued. */
  readonly inbox: Inbox;
  close(): Promise<void>;
}

/** A connected endpoint that writes frames to one remote inbound endpoint. */
export interface OutboundEndpoint {
  readonly address: string;
  /**
   * Writes one frame. Rejects when the endpoint is broken or when the frame
   * cannot be queued within `timeoutMs` (`-1` waits forever).
   */
  write(frame: Uint8Array, timeoutMs: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * Transport adapter. Abstracts endpoint creation so that the driver can run
 * over TCP sockets, in-process queues or libp2p streams.
 */
export interface Transport {
  /** Protocol name, as passed in the driver's `protocol` option. */
  readonly protocol: string;

  /** Prepare the transport; `host` is the address advertised to peers. */
  start(host: string): Promise<void>;

  /** Close every endpoint the transport created and release its resources. */
  stop(): Promise<void>;

  /** Bind a new inbound endpoint of the given kind on an OS-assigned port. */
  bind(kind: ChannelKind): Promise<InboundEndpoint>;

  /**
   * Connect a new outbound endpoint to a remote inbound endpoint of the given
   * kind. Connection setup gives up after `timeoutMs` (`-1` waits forever).
   */
  connect(address: string, kind: ChannelKind, timeoutMs: number): Promise<OutboundEndpoint>;
}
