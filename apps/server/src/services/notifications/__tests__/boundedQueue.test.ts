/**
 * Bounded queue tests
 */

import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../boundedQueue.js';

describe('BoundedQueue', () => {
  it('is FIFO', () => {
    const queue = new BoundedQueue<number>(3);
    queue.push(1);
    queue.push(2);
    expect(queue.shift()).toBe(1);
    expect(queue.shift()).toBe(2);
    expect(queue.shift()).toBeUndefined();
  });

  it('drops the oldest item when full', () => {
    const queue = new BoundedQueue<number>(2);
    expect(queue.push(1)).toBeUndefined();
    expect(queue.push(2)).toBeUndefined();
    expect(queue.push(3)).toBe(1);
    expect(queue.size).toBe(2);
    expect(queue.shift()).toBe(2);
  });

  it('drops the oldest items when shrunk', () => {
    const queue = new BoundedQueue<number>(5);
    [1, 2, 3, 4].forEach((n) => queue.push(n));

    expect(queue.resize(1)).toEqual([1, 2, 3]);
    expect(queue.capacity).toBe(1);
    expect(queue.shift()).toBe(4);
  });

  it('rejects a capacity below one', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
  });
});
