/** Destination carried by messages sent through `Driver.broadcast`. */
export const BROADCAST_DESTINATION = '*';

/**
 * A message exchanged between drivers. The driver reads `destination` to route
 * unicast messages and `source`/`tag` for logging; the payload is opaque to it.
 */
export interface Message<P = unknown> {
  /** Kind of message, interpreted by the caller. */
  tag: string;
  /** Name of the sending peer. */
  source: string;
  /** Name of the receiving peer, or `*` for broadcasts. */
  destination: string;
  /** Groups the messages of one exchange. */
  sessionId: string;
  messageId: string;
  payload: P;
}

export interface MessageInit<P = unknown> {
  tag: string;
  source: string;
  destination?: string;
  payload: P;
  sessionId?: string;
}

/** Turns messages into frame bytes and back. Must be symmetric. */
export interface MessageCodec {
  encode(message: Message): Uint8Array;
  decode(bytes: Uint8Array): Message;
}
