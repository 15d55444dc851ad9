/**
 * Kinds of inbound channel a driver exposes to its peers. Used as the keys of a
 * driver's address map and of the peer address map handed to `Driver.connect`.
 */
export const ChannelKind = {
  /** Direct, point-to-point delivery to this driver. */
  UnicastInbound: 'unicast-inbound',
  /** Fan-out delivery: this driver subscribes to every broadcast sent to it. */
  BroadcastInbound: 'broadcast-inbound',
} as const;

export type ChannelKind = (typeof ChannelKind)[keyof typeof ChannelKind];

/** Bound address of each of this driver's inbound channels. */
export type AddressMap = Record<ChannelKind, string>;

/**
 * Peer addresses as exchanged with the discovery layer: peer name to channel kind
 * to address. Keys arrive from outside the process, so they are plain strings
 * and are validated on connect.
 */
export type PeersAddress = Record<string, Record<string, string>>;

const CHANNEL_KINDS: readonly string[] = Object.values(ChannelKind);

export function isChannelKind(value: string): value is ChannelKind {
  return CHANNEL_KINDS.includes(value);
}
