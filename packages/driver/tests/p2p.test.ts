import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ChannelKind } from '../src/channel/kinds.js';
import { Driver } from '../src/driver.js';
import { createMessage } from '../src/protocol/message.js';
import { news } from './fixtures/messages.js';
import { first } from './fixtures/wait.js';

const { UnicastInbound, BroadcastInbound } = ChannelKind;

describe('P2P Integration', () => {
  let driverA: Driver;
  let driverB: Driver;

  beforeAll(async () => {
    const options = { protocol: 'libp2p', host: '127.0.0.1', sendTimeout: 10_000 };
    driverA = await Driver.create(options);
    driverB = await Driver.create(options);
    await driverA.connect({ b: driverB.address });
  }, 30_000);

  afterAll(async () => {
    await driverA?.close();
    await driverB?.close();
  }, 15_000);

  it('advertises the node multiaddr for both channel kinds', () => {
    const address = driverB.address;
    expect(address[UnicastInbound]).toMatch(/^\/ip4\/127\.0\.0\.1\/tcp\/\d+\/p2p\/\w+$/);
    expect(address[BroadcastInbound]).toBe(address[UnicastInbound]);
  });

  it('full unicast round-trip over libp2p', async () => {
    const message = createMessage({
      tag: 'task',
      source: 'a',
      destination: 'b',
      payload: { message: 'hello p2p' },
    });

    expect(await driverA.send(message)).toEqual({ sent: true });
    expect(await first(driverB.receive(false))).toEqual(message);
  }, 30_000);

  it('broadcast reaches the subscriber', async () => {
    expect(await driverA.broadcast(news('a', 'mesh works'))).toEqual({ sent: true });

    const received = await first(driverB.receive(false));
    expect(received?.payload).toBe('mesh works');
  }, 30_000);
});
