import { networkInterfaces } from 'node:os';

const LOOPBACK = '127.0.0.1';

/**
 * IPv4 address peers can reach this host at: the first non-internal IPv4
 * interface address, or loopback when the host has none.
 */
export function resolveHostAddress(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const info of addresses ?? []) {
      if (info.family === 'IPv4' && !info.internal) {
        return info.address;
      }
    }
  }
  return LOOPBACK;
}
