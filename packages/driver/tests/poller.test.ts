import { describe, it, expect, beforeEach } from 'vitest';
import { Inbox } from '../src/channel/inbox.js';
import { ChannelKind } from '../src/channel/kinds.js';
import { Poller } from '../src/channel/poller.js';

const frame = (value: string) => new TextEncoder().encode(value);

describe('Inbox', () => {
  it('queues frames first in, first out', () => {
    const inbox = new Inbox(ChannelKind.UnicastInbound);
    inbox.push(frame('a'));
    inbox.push(frame('b'));

    expect(inbox.size).toBe(2);
    expect(new TextDecoder().decode(inbox.shift())).toBe('a');
    expect(new TextDecoder().decode(inbox.shift())).toBe('b');
    expect(inbox.shift()).toBeUndefined();
  });

  it('drops frames once closed', () => {
    const inbox = new Inbox(ChannelKind.UnicastInbound);
    inbox.push(frame('a'));
    inbox.close();
    inbox.push(frame('b'));

    expect(inbox.isClosed).toBe(true);
    expect(inbox.size).toBe(0);
  });

  it('keeps the first failure', () => {
    const inbox = new Inbox(ChannelKind.BroadcastInbound);
    inbox.fail(new Error('first'));
    inbox.fail(new Error('second'));
    expect(inbox.error?.message).toBe('first');
  });

  it('stops notifying a watcher after unwatch', () => {
    const inbox = new Inbox(ChannelKind.UnicastInbound);
    let calls = 0;
    const unwatch = inbox.watch(() => {
      calls += 1;
    });
    inbox.push(frame('a'));
    unwatch();
    inbox.push(frame('b'));
    expect(calls).toBe(1);
  });
});

describe('Poller', () => {
  let unicast: Inbox;
  let broadcast: Inbox;
  let poller: Poller;

  beforeEach(() => {
    unicast = new Inbox(ChannelKind.UnicastInbound);
    broadcast = new Inbox(ChannelKind.BroadcastInbound);
    poller = new Poller();
    poller.register(unicast);
    poller.register(broadcast);
  });

  it('reports ready inboxes in registration order', async () => {
    broadcast.push(frame('b'));
    unicast.push(frame('u'));

    const ready = await poller.poll(-1);
    expect(ready).toEqual([unicast, broadcast]);
  });

  it('registers an inbox once', async () => {
    poller.register(unicast);
    unicast.push(frame('u'));
    expect(await poller.poll(0)).toEqual([unicast]);
  });

  it('returns nothing when the timeout elapses', async () => {
    const started = Date.now();
    const ready = await poller.poll(30);
    expect(ready).toEqual([]);
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });

  it('does not wait with a zero timeout', async () => {
    expect(await poller.poll(0)).toEqual([]);
  });

  it('lets queued I/O run before a zero timeout gives up', async () => {
    setImmediate(() => unicast.push(frame('u')));
    expect(await poller.poll(0)).toEqual([unicast]);
  });

  it('wakes up when a frame arrives', async () => {
    const pending = poller.poll(-1);
    broadcast.push(frame('b'));
    expect(await pending).toEqual([broadcast]);
  });

  it('serves unicast first when both arrive before the waiter resumes', async () => {
    const pending = poller.poll(-1);
    broadcast.push(frame('b'));
    unicast.push(frame('u'));
    const ready = await pending;
    expect(ready[0]).toBe(unicast);
  });

  it('rejects when an inbox has failed', async () => {
    unicast.fail(new Error('socket gone'));
    await expect(poller.poll(-1)).rejects.toThrow('socket gone');
  });

  it('rejects a pending poll when an inbox fails', async () => {
    const pending = poller.poll(-1);
    broadcast.fail(new Error('listener crashed'));
    await expect(pending).rejects.toThrow('listener crashed');
  });

  it('rejects when an inbox is closed', async () => {
    const pending = poller.poll(-1);
    unicast.close();
    await expect(pending).rejects.toThrow('The unicast-inbound endpoint is closed');
  });
});
