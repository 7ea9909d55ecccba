/**
 * Fixed-capacity single-reader FIFO
 * Offers never block: a full queue rejects the item. The reader waits on
 * take() until an item arrives, the queue closes, or its timeout elapses.
 */

export type QueueReceipt<T> =
  | { kind: 'item'; value: T }
  | { kind: 'closed' }
  | { kind: 'timeout' };

type Waiter<T> = (receipt: QueueReceipt<T>) => void;

export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue without waiting
   * @returns false when the queue is full or closed
   */
  offer(item: T): boolean {
    if (this.closed) return false;

    // A waiting reader implies the buffer is empty
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ kind: 'item', value: item });
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Stop accepting items and wake a waiting reader.
   * Items already buffered are still handed out before 'closed'.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter({ kind: 'closed' });
    }
  }

  /**
   * Dequeue the next item, waiting at most timeoutMs for one to arrive
   */
  take(timeoutMs: number): Promise<QueueReceipt<T>> {
    if (this.waiter) {
      return Promise.reject(new Error('BoundedQueue supports a single reader'));
    }

    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ kind: 'item', value });
    }

    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }

    return new Promise<QueueReceipt<T>>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: 'timeout' });
      }, timeoutMs);

      this.waiter = (receipt) => {
        clearTimeout(timer);
        resolve(receipt);
      };
    });
  }
}
