import { RingBuffer, assertCapacity } from './ring-buffer.js';
import type { ArrayQueueOptions, Queue } from './types.js';

const DEFAULT_INITIAL_CAPACITY = 10;

/**
 * Unbounded FIFO queue over a circular array.
 * Doubles when full and halves when only a quarter full.
 */
export class ArrayQueue<T> implements Queue<T> {
  private readonly buffer: RingBuffer<T>;
  private readonly initialCapacity: number;

  constructor(options?: ArrayQueueOptions) {
    this.initialCapacity = assertCapacity(
      options?.initialCapacity ?? DEFAULT_INITIAL_CAPACITY,
      'initialCapacity',
    );
    this.buffer = new RingBuffer<T>(this.initialCapacity);
  }

  get size(): number {
    return this.buffer.size;
  }

  /** Slots currently allocated. */
  get capacity(): number {
    return this.buffer.capacity;
  }

  isEmpty(): boolean {
    return this.buffer.size === 0;
  }

  first(): T {
    return this.buffer.peek();
  }

  enqueue(element: T): void {
    this.buffer.grow();
    this.buffer.push(element);
  }

  dequeue(): T {
    const element = this.buffer.shift();
    this.buffer.shrink(this.initialCapacity);
    return element;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.buffer[Symbol.iterator]();
  }
}
