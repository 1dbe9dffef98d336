import { EmptyError } from './errors.js';
import { describeItems, takeMany } from './singly-linked.js';
import type { SinglyNode } from './singly-linked.js';
import type { Queue } from './types.js';

/** FIFO queue on a singly linked chain with head and tail pointers. */
export class LinkedQueue<T> implements Queue<T> {
  private head: SinglyNode<T> | null = null;
  private tail: SinglyNode<T> | null = null;
  private count = 0;

  constructor(items?: Iterable<T>) {
    if (items !== undefined) {
      this.enqueueMany(items);
    }
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  first(): T {
    return this.endNode(this.head).element;
  }

  last(): T {
    return this.endNode(this.tail).element;
  }

  enqueue(element: T): void {
    const node: SinglyNode<T> = { element, next: null };
    if (this.tail === null) {
      this.head = node;
    } else {
      this.tail.next = node;
    }
    this.tail = node;
    this.count++;
  }

  enqueueMany(items: Iterable<T>): void {
    for (const item of items) {
      this.enqueue(item);
    }
  }

  dequeue(): T {
    const node = this.endNode(this.head);
    this.head = node.next;
    this.count--;
    if (this.head === null) {
      this.tail = null;
    }
    return node.element;
  }

  /**
   * Dequeues `n` elements, front first.
   * Throws `EmptyError` on an empty queue and `RangeError` when `n` is out of range.
   */
  dequeueMany(n: number): T[] {
    return takeMany(n, { verb: 'dequeue', noun: 'Queue', size: this.count }, () => this.dequeue());
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.count = 0;
  }

  copy(): LinkedQueue<T> {
    return new LinkedQueue(this);
  }

  /** Inverte as ligações no lugar; o antigo head vira tail */
  reverse(): void {
    let previous: SinglyNode<T> | null = null;
    let cursor = this.head;
    while (cursor !== null) {
      const next = cursor.next;
      cursor.next = previous;
      previous = cursor;
      cursor = next;
    }
    this.tail = this.head;
    this.head = previous;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let cursor = this.head; cursor !== null; cursor = cursor.next) {
      yield cursor.element;
    }
  }

  toString(): string {
    return describeItems('LinkedQueue', this);
  }

  private endNode(node: SinglyNode<T> | null): SinglyNode<T> {
    if (node === null) {
      throw new EmptyError('Queue is empty');
    }
    return node;
  }
}
