import { RingBuffer, assertCapacity } from './ring-buffer.js';
import type { ArrayDequeOptions, Deque } from './types.js';

const DEFAULT_INITIAL_CAPACITY = 10;

/** Unbounded deque over a circular array; grows and shrinks like `ArrayQueue`. */
export class ArrayDeque<T> implements Deque<T> {
  private readonly buffer: RingBuffer<T>;
  private readonly initialCapacity: number;

  constructor(options?: ArrayDequeOptions) {
    this.initialCapacity = assertCapacity(
      options?.initialCapacity ?? DEFAULT_INITIAL_CAPACITY,
      'initialCapacity',
    );
    this.buffer = new RingBuffer<T>(this.initialCapacity, 'Deque');
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

  first(): T {
    return this.buffer.peek();
  }

  last(): T {
    return this.buffer.peekLast();
  }

  addFirst(element: T): void {
    this.buffer.grow();
    this.buffer.unshift(element);
  }

  addLast(element: T): void {
    this.buffer.grow();
    this.buffer.push(element);
  }

  deleteFirst(): T {
    const element = this.buffer.shift();
    this.buffer.shrink(this.initialCapacity);
    return element;
  }

  deleteLast(): T {
    const element = this.buffer.pop();
    this.buffer.shrink(this.initialCapacity);
    return element;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.buffer[Symbol.iterator]();
  }
}
