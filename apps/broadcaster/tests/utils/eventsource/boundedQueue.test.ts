import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../../../src/utils/eventsource/BoundedQueue.ts';

describe('BoundedQueue', () => {
  it.each([0, -1, 1.5])('should reject capacity %s', (capacity) => {
    expect(() => new BoundedQueue<string>(capacity)).toThrow(RangeError);
  });

  it('should reject offers once full', () => {
    const queue = new BoundedQueue<string>(2);

    expect(queue.offer('a')).toBe(true);
    expect(queue.offer('b')).toBe(true);
    expect(queue.offer('c')).toBe(false);
    expect(queue.size).toBe(2);
  });

  it('should hand out items in FIFO order', async () => {
    const queue = new BoundedQueue<string>(3);
    queue.offer('a');
    queue.offer('b');

    expect(await queue.take(100)).toEqual({ kind: 'item', value: 'a' });
    expect(await queue.take(100)).toEqual({ kind: 'item', value: 'b' });
    expect(queue.size).toBe(0);
  });

  it('should pass an offer straight to a waiting reader', async () => {
    const queue = new BoundedQueue<string>(1);
    const pending = queue.take(1000);

    expect(queue.offer('x')).toBe(true);
    expect(await pending).toEqual({ kind: 'item', value: 'x' });
    expect(queue.size).toBe(0);
  });

  it('should wake a waiting reader on close', async () => {
    const queue = new BoundedQueue<string>(1);
    const pending = queue.take(1000);

    queue.close();

    expect(await pending).toEqual({ kind: 'closed' });
    expect(queue.isClosed).toBe(true);
  });

  it('should drain buffered items before reporting closed', async () => {
    const queue = new BoundedQueue<string>(2);
    queue.offer('a');
    queue.close();

    expect(queue.offer('b')).toBe(false);
    expect(await queue.take(100)).toEqual({ kind: 'item', value: 'a' });
    expect(await queue.take(100)).toEqual({ kind: 'closed' });
  });

  it('should report a timeout when nothing arrives', async () => {
    const queue = new BoundedQueue<string>(1);

    expect(await queue.take(10)).toEqual({ kind: 'timeout' });
    // The reader slot is free again
    queue.offer('late');
    expect(await queue.take(10)).toEqual({ kind: 'item', value: 'late' });
  });

  it('should allow a single waiting reader', async () => {
    const queue = new BoundedQueue<string>(1);
    const first = queue.take(1000);

    await expect(queue.take(1000)).rejects.toThrow(
      'BoundedQueue supports a single reader',
    );

    queue.close();
    expect(await first).toEqual({ kind: 'closed' });
  });
});
