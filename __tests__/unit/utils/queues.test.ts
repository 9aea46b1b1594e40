import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../../../src/utils/async-queue';
import { RingBuffer } from '../../../src/utils/ring-buffer';
import { SerialQueue } from '../../../src/application/serial-queue';

describe('RingBuffer', () => {
  it('evicts the oldest element when full', () => {
    const rb = new RingBuffer<number>(3);
    expect([1, 2, 3].map(v => rb.push(v))).toEqual([undefined, undefined, undefined]);
    expect(rb.isFull()).toBe(true);
    expect(rb.push(4)).toBe(1);
    expect(rb.toArray()).toEqual([2, 3, 4]);
    expect(rb.at(0)).toBe(2);
    expect(rb.at(3)).toBeUndefined();
    expect(rb.last()).toBe(4);
    expect(rb.tail(2)).toEqual([3, 4]);
    expect(rb.tail(9)).toEqual([2, 3, 4]);
    rb.clear();
    expect(rb.length).toBe(0);
  });

  it('rejects a bad capacity', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
  });
});

describe('AsyncQueue', () => {
  it('hands buffered and later items to the consumer, then ends on close', async () => {
    const q = new AsyncQueue<number>();
    q.push(1);
    const seen: number[] = [];
    const consumer = (async () => { for await (const v of q) seen.push(v); })();
    q.push(2);
    await new Promise(r => setTimeout(r, 0));
    q.close();
    await consumer;
    expect(seen).toEqual([1, 2]);
    expect(q.push(3)).toBe(false);
  });
});

describe('SerialQueue', () => {
  it('runs tasks one at a time in order and isolates failures', async () => {
    const q = new SerialQueue();
    const order: string[] = [];
    const slow = q.run(async () => {
      await new Promise(r => setTimeout(r, 5));
      order.push('slow');
      return 1;
    });
    const failing = q.run(() => { order.push('fail'); throw new Error('boom'); });
    const fast = q.run(() => { order.push('fast'); return 3; });
    expect(q.size).toBe(3);
    const [a, b, c] = await Promise.allSettled([slow, failing, fast]);
    expect(a).toEqual({ status: 'fulfilled', value: 1 });
    expect(b.status).toBe('rejected');
    expect(c).toEqual({ status: 'fulfilled', value: 3 });
    await q.idle();
    expect(order).toEqual(['slow', 'fail', 'fast']);
    expect(q.size).toBe(0);
  });
});
