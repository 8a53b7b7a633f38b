import { describe, expect, it } from '@jest/globals';

import { ErrorSlot, EventChannel } from '../../../src/conversion/streaming/event-channel.js';

describe('EventChannel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new EventChannel<string>(0)).toThrow(RangeError);
  });

  it('holds senders back until there is room', async () => {
    const channel = new EventChannel<string>(1);
    await expect(channel.send('a')).resolves.toBe(true);
    let delivered: boolean | undefined;
    const pending = channel.send('b').then((ok) => {
      delivered = ok;
    });
    await Promise.resolve();
    expect(delivered).toBeUndefined();
    expect(channel.size).toBe(1);

    const iterator = channel[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: 'a', done: false });
    await pending;
    expect(delivered).toBe(true);

    channel.close();
    await expect(iterator.next()).resolves.toEqual({ value: 'b', done: false });
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('releases blocked senders with false once cancelled', async () => {
    const channel = new EventChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.cancel();
    await expect(blocked).resolves.toBe(false);
    await expect(channel.send(3)).resolves.toBe(false);
  });

  it('cancels when the consumer stops early', async () => {
    const channel = new EventChannel<number>(4);
    await channel.send(1);
    await channel.send(2);
    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }
    expect(channel.cancelled).toBe(true);
    expect(channel.size).toBe(0);
  });

  it('refuses sends after close', async () => {
    const channel = new EventChannel<number>();
    channel.close();
    await expect(channel.send(1)).rejects.toThrow('send on closed event channel');
  });
});

describe('ErrorSlot', () => {
  it('keeps the first error and refuses reports once sealed', async () => {
    const slot = new ErrorSlot();
    const first = new Error('first');
    expect(slot.report(first)).toBe(true);
    expect(slot.report(new Error('second'))).toBe(false);
    slot.seal();
    await expect(slot.settled).resolves.toBe(first);
  });

  it('settles empty when sealed without an error', async () => {
    const slot = new ErrorSlot();
    slot.seal();
    expect(slot.report(new Error('late'))).toBe(false);
    await expect(slot.settled).resolves.toBeUndefined();
  });
});
