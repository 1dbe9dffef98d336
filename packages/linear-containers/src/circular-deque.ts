import { FullError } from './errors.js';
import { RingBuffer } from './ring-buffer.js';
import type { CircularDequeOptions, Deque } from './types.js';

const DEFAULT_CAPACITY = 10;

/** Deque with a fixed number of slots. */
export class CircularDeque<T> implements Deque<T> {
  private readonly buffer: RingBuffer<T>;

  constructor(options?: CircularDequeOptions) {
    this.buffer = new RingBuffer<T>(options?.capacity ?? DEFAULT_CAPACITY, 'Deque');
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

  last(): T {
    return this.buffer.peekLast();
  }

  /** Throws `FullError` when all slots are taken. */
  addFirst(element: T): void {
    this.assertRoom();
    this.buffer.unshift(element);
  }

  /** Throws `FullError` when all slots are taken. */
  addLast(element: T): void {
    this.assertRoom();
    this.buffer.push(element);
  }

  deleteFirst(): T {
    return this.buffer.shift();
  }

  deleteLast(): T {
    return this.buffer.pop();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.buffer[Symbol.iterator]();
  }

  private assertRoom(): void {
    if (this.buffer.isFull()) {
      throw new FullError('Deque is full');
    }
  }
}
