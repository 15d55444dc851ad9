import net, { type Server, type Socket } from 'node:net';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ChannelKind } from '../src/channel/kinds.js';
import { Driver, type SendResult } from '../src/driver.js';
import { PeersConnectionError } from '../src/errors.js';
import { createMessage } from '../src/protocol/message.js';
import { news, ping } from './fixtures/messages.js';
import { first, take } from './fixtures/wait.js';

const { UnicastInbound, BroadcastInbound } = ChannelKind;
const LARGE_PAYLOAD = 'x'.repeat(1024 * 1024);

/** Keeps writing until the result is a failure. Gives up after 64 attempts. */
async function sendUntilRejected(send: () => Promise<SendResult>): Promise<SendResult> {
  let result: SendResult = { sent: true };
  for (let attempt = 0; attempt < 64 && result.sent; attempt++) {
    result = await send();
  }
  return result;
}

const options = { protocol: 'tcp', host: '127.0.0.1', sendTimeout: 2_000, receiveTimeout: 100 };

describe('Driver over TCP', () => {
  let driverA: Driver;
  let driverB: Driver;
  let driverC: Driver;

  beforeEach(async () => {
    driverA = await Driver.create(options);
    driverB = await Driver.create(options);
    driverC = await Driver.create(options);
  });

  afterEach(async () => {
    await driverA.close();
    await driverB.close();
    await driverC.close();
  });

  it('advertises tcp addresses on distinct ports', () => {
    const address = driverA.address;
    expect(address[UnicastInbound]).toMatch(/^tcp:\/\/127\.0\.0\.1:\d+$/);
    expect(address[BroadcastInbound]).toMatch(/^tcp:\/\/127\.0\.0\.1:\d+$/);
    expect(address[UnicastInbound]).not.toBe(address[BroadcastInbound]);
  });

  it('delivers a unicast message to the peer bound at the advertised address', async () => {
    await driverA.connect({ b: driverB.address });
    const message = createMessage({
      tag: 'task',
      source: 'a',
      destination: 'b',
      payload: { text: 'over the wire', values: [1.5, -2, 'x'] },
    });

    expect(await driverA.send(message)).toEqual({ sent: true });
    expect(await first(driverB.receive(false))).toEqual(message);
  });

  it('keeps per-sender order', async () => {
    await driverA.connect({ b: driverB.address });
    for (let n = 0; n < 20; n++) {
      await driverA.send(ping('a', 'b', n));
    }

    const messages = await take(driverB.receive(), 20);
    expect(messages.map((m) => m.payload)).toEqual(
      Array.from({ length: 20 }, (_, n) => ({ n })),
    );
  });

  it('broadcasts to every subscriber', async () => {
    await driverA.connect({ b: driverB.address, c: driverC.address });

    expect(await driverA.broadcast(news('a', 'hello tcp'))).toEqual({ sent: true });

    const [atB, atC] = await Promise.all([
      first(driverB.receive(false)),
      first(driverC.receive(false)),
    ]);
    expect(atB?.source).toBe('a');
    expect(atC?.source).toBe('a');
    expect(atC?.payload).toBe('hello tcp');
  });

  it('lets two drivers talk both ways', async () => {
    await driverA.connect({ b: driverB.address });
    await driverB.connect({ a: driverA.address });

    await driverA.send(ping('a', 'b', 1));
    const request = await first(driverB.receive(false));
    expect(request?.source).toBe('a');

    await driverB.send(ping('b', request?.source ?? 'a', 2));
    const reply = await first(driverA.receive(false));
    expect(reply?.payload).toEqual({ n: 2 });
  });

  it('raises PeersConnectionError when the peer is not listening', async () => {
    const address = driverC.address;
    await driverC.close();

    const connecting = driverA.connect({ c: address });
    await expect(connecting).rejects.toBeInstanceOf(PeersConnectionError);
    await expect(connecting).rejects.toThrow('Driver cannot connect to c');
    expect(driverA.peers).toEqual([]);
  });
});

describe('Driver over TCP with a stalled peer', () => {
  let server: Server;
  let address: string;
  const sockets = new Set<Socket>();
  let sender: Driver | undefined;

  beforeEach(async () => {
    // Accepts connections but never reads from them.
    server = net.createServer({ pauseOnConnect: true }, (socket) => {
      sockets.add(socket);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const bound = server.address();
    if (bound === null || typeof bound === 'string') {
      throw new Error('stalled server has no port');
    }
    address = `tcp://127.0.0.1:${bound.port}`;
  });

  afterEach(async () => {
    for (const socket of sockets) {
      socket.destroy();
    }
    sockets.clear();
    await sender?.close();
    sender = undefined;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('connects and sends with a zero send timeout', async () => {
    const peer = await Driver.create(options);
    try {
      sender = await Driver.create({ ...options, sendTimeout: 0 });
      await sender.connect({ b: peer.address });

      expect(await sender.send(ping('a', 'b', 4))).toEqual({ sent: true });
      expect((await first(peer.receive(false)))?.payload).toEqual({ n: 4 });
    } finally {
      await peer.close();
    }
  });

  it('returns a timeout error once a unicast write cannot be queued in time', async () => {
    sender = await Driver.create({ ...options, sendTimeout: 50 });
    await sender.connect({ stall: { [UnicastInbound]: address } });
    const driver = sender;

    const result = await sendUntilRejected(() =>
      driver.send(createMessage({ tag: 'bulk', source: 'a', destination: 'stall', payload: LARGE_PAYLOAD })),
    );
    expect(result.sent).toBe(false);
    if (!result.sent) {
      expect(result.error.message).toBe(
        `Failure to send message to stall: Write to ${address} timed out after 50ms.`,
      );
    }
  });

  it('fails at once with a zero send timeout', async () => {
    sender = await Driver.create({ ...options, sendTimeout: 0 });
    await sender.connect({ stall: { [UnicastInbound]: address } });
    const driver = sender;

    const result = await sendUntilRejected(() =>
      driver.send(createMessage({ tag: 'bulk', source: 'a', destination: 'stall', payload: LARGE_PAYLOAD })),
    );
    expect(result.sent).toBe(false);
    if (!result.sent) {
      expect(result.error.message).toBe(
        `Failure to send message to stall: Write to ${address} timed out after 0ms.`,
      );
    }
  });

  it('returns a broadcast error naming the stalled subscriber', async () => {
    sender = await Driver.create({ ...options, sendTimeout: 50 });
    await sender.connect({ stall: { [BroadcastInbound]: address } });
    const driver = sender;

    const result = await sendUntilRejected(() =>
      driver.broadcast(createMessage({ tag: 'bulk', source: 'a', payload: LARGE_PAYLOAD })),
    );
    expect(result.sent).toBe(false);
    if (!result.sent) {
      expect(result.error.message).toBe(`Failure to broadcast message: Broadcast failed for ${address}`);
      expect(result.error.cause).toBeInstanceOf(AggregateError);
    }
  });
});
