import { FullError } from './errors.js';
import { RingBuffer } from './ring-buffer.js';
import type { CircularQueueOptions, Queue } from './types.js';

const DEFAULT_CAPACITY = 10;

/** FIFO queue with a fixed number of slots. */
export class CircularQueue<T> implements Queue<T> {
  private readonly buffer: RingBuffer<T>;

  constructor(options?: CircularQueueOptions) {
    this.buffer = new RingBuffer<T>(options?.capacity ?? DEFAULT_CAPACITY);
  }

  get size(): number {
    return this.buffer.size;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  isEmpty(): boolean {
    return this.buffer.size === 0;
  }

  isFull(): boolean {
    return this.buffer.isFull();
  }

  first(): T {
    return this.buffer.peek();
  }

  /** Throws `FullError` when all slots are taken. */
  enqueue(element: T): void {
    if (this.buffer.isFull()) {
      throw new FullError('Queue is full');
    }
    this.buffer.push(element);
  }

  dequeue(): T {
    return this.buffer.shift();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.buffer[Symbol.iterator]();
  }
}
