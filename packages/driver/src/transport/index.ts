import type { Transport } from './interface.js';
import { Libp2pTransport } from './libp2p.js';
import { LocalTransport } from './local.js';
import { TcpTransport } from './tcp.js';

export type TransportFactory = () => Transport;

const TRANSPORTS = new Map<string, TransportFactory>([
  ['tcp', () => new TcpTransport()],
  ['inproc', () => new LocalTransport()],
  ['libp2p', () => new Libp2pTransport()],
]);

/** Protocol names accepted by `createTransport`. */
export function supportedProtocols(): string[] {
  return [...TRANSPORTS.keys()];
}

export function createTransport(protocol: string): Transport {
  const factory = TRANSPORTS.get(protocol);
  if (!factory) {
    throw new Error(
      `Unsupported transport protocol "${protocol}" (expected one of: ${supportedProtocols().join(', ')})`,
    );
  }
  return factory();
}
