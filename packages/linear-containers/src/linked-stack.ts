import { EmptyError } from './errors.js';
import { describeItems, takeMany } from './singly-linked.js';
import type { SinglyNode } from './singly-linked.js';
import type { Stack } from './types.js';

/**
 * LIFO stack on a singly linked chain. The head node is the top.
 * Every operation is O(1) except the batch ones, `copy` and `reverse`.
 */
export class LinkedStack<T> implements Stack<T> {
  private head: SinglyNode<T> | null = null;
  private count = 0;

  /** Pushes `items` in order, so the last one ends on top. */
  constructor(items?: Iterable<T>) {
    if (items !== undefined) {
      this.pushMany(items);
    }
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  push(element: T): void {
    this.head = { element, next: this.head };
    this.count++;
  }

  pushMany(items: Iterable<T>): void {
    for (const item of items) {
      this.push(item);
    }
  }

  top(): T {
    return this.topNode().element;
  }

  pop(): T {
    const node = this.topNode();
    this.head = node.next;
    this.count--;
    return node.element;
  }

  /**
   * Pops `n` elements, returned in the order they were popped.
   * Throws `EmptyError` on an empty stack and `RangeError` when `n` is
   * negative, fractional or larger than `size`.
   */
  popMany(n: number): T[] {
    return takeMany(n, { verb: 'pop', noun: 'Stack', size: this.count }, () => this.pop());
  }

  clear(): void {
    this.head = null;
    this.count = 0;
  }

  /** Independent stack with the same elements, same top. */
  copy(): LinkedStack<T> {
    return new LinkedStack([...this].reverse());
  }

  /** Turns the stack upside down by relinking the existing nodes. */
  reverse(): void {
    let previous: SinglyNode<T> | null = null;
    let cursor = this.head;
    while (cursor !== null) {
      const next = cursor.next;
      cursor.next = previous;
      previous = cursor;
      cursor = next;
    }
    this.head = previous;
  }

  /** Top to bottom. */
  *[Symbol.iterator](): IterableIterator<T> {
    for (let cursor = this.head; cursor !== null; cursor = cursor.next) {
      yield cursor.element;
    }
  }

  /** e.g. `LinkedStack([3, 2, 1])`, top first. */
  toString(): string {
    return describeItems('LinkedStack', this);
  }

  private topNode(): SinglyNode<T> {
    if (this.head === null) {
      throw new EmptyError('Stack is empty');
    }
    return this.head;
  }
}
