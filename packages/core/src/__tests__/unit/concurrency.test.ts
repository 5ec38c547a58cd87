import { describe, it, expect } from 'vitest';
import { AsyncChannel } from '../../utils/channel.js';
import { runPool, sleep, withTimeout } from '../../utils/async.js';
import { isLumoraError } from '../../errors.js';

describe('AsyncChannel', () => {
  it('delivers buffered messages in send order', async () => {
    const channel = new AsyncChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const message of channel) {
      received.push(message);
    }
    expect(received).toEqual([1, 2]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new AsyncChannel<string>();
    const pending = channel.receive();
    channel.send('ready');
    await expect(pending).resolves.toEqual({ value: 'ready', done: false });
  });

  it('ends iteration for a waiting consumer on close', async () => {
    const channel = new AsyncChannel<string>();
    const pending = channel.receive();
    channel.close();
    const result = await pending;
    expect(result.done).toBe(true);
  });

  it('rejects sends after close', () => {
    const channel = new AsyncChannel<number>();
    channel.close();
    expect(channel.isClosed).toBe(true);
    expect(() => channel.send(1)).toThrow('Cannot send on a closed channel');
  });

  it('tracks pending messages', () => {
    const channel = new AsyncChannel<number>();
    channel.send(5);
    expect(channel.pending).toBe(1);
  });
});

describe('runPool', () => {
  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 12 }, (_, i) => i);

    await runPool(items, 3, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await sleep((item % 4) * 2);
      active--;
      return item;
    });

    expect(peak).toBe(3);
  });

  it('returns results in input order regardless of completion order', async () => {
    const delays = [15, 1, 8, 3];
    const results = await runPool(delays, 4, async (delay, index) => {
      await sleep(delay);
      return `item-${index}`;
    });
    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('calls onSettled once per item', async () => {
    const settled: number[] = [];
    await runPool([1, 2, 3, 4, 5], 2, async (n) => n * 10, (_, index) => settled.push(index));
    expect([...settled].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it('handles an empty input', async () => {
    await expect(runPool([], 5, async () => 1)).resolves.toEqual([]);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'fast')).resolves.toBe('ok');
  });

  it('rejects with a TIMEOUT error when the deadline passes', async () => {
    const error = await withTimeout(sleep(100), 5, 'slow call').catch((e: unknown) => e);
    expect(isLumoraError(error)).toBe(true);
    if (isLumoraError(error)) {
      expect(error.code).toBe('TIMEOUT');
      expect(error.message).toBe('Operation timed out: slow call');
    }
  });
});
