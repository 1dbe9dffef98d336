import { EmptyError } from './errors.js';
import { describeItems, takeMany } from './singly-linked.js';
import type { SinglyNode } from './singly-linked.js';
import type { Queue } from './types.js';

/**
 * Fila numa lista circular simplesmente encadeada.
 * Só guarda o tail; tail.next é o primeiro. Com um elemento, tail.next === tail.
 */
export class CircularLinkedQueue<T> implements Queue<T> {
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
    return this.headNode().element;
  }

  last(): T {
    return this.tailNode().element;
  }

  enqueue(element: T): void {
    const node: SinglyNode<T> = { element, next: null };
    if (this.tail === null) {
      node.next = node;
    } else {
      node.next = this.tail.next;
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
    const tail = this.tailNode();
    const head = this.headNode();
    if (head === tail) {
      this.tail = null;
    } else {
      tail.next = head.next;
    }
    this.count--;
    return head.element;
  }

  /** Dequeues `n` elements, front first. */
  dequeueMany(n: number): T[] {
    return takeMany(n, { verb: 'dequeue', noun: 'Queue', size: this.count }, () => this.dequeue());
  }

  /** Moves the front element to the back in O(1). No-op with fewer than two elements. */
  rotate(): void {
    if (this.tail !== null && this.count > 1) {
      this.tail = this.headNode();
    }
  }

  /** Inverte o anel no lugar; o antigo primeiro vira o novo tail */
  reverse(): void {
    if (this.tail === null || this.count < 2) {
      return;
    }
    const oldHead = this.headNode();
    let previous = this.tail;
    let cursor = oldHead;
    for (let k = 0; k < this.count; k++) {
      const next = this.successor(cursor);
      cursor.next = previous;
      previous = cursor;
      cursor = next;
    }
    this.tail = oldHead;
  }

  clear(): void {
    this.tail = null;
    this.count = 0;
  }

  copy(): CircularLinkedQueue<T> {
    return new CircularLinkedQueue(this);
  }

  /** Same size and `===` elements in the same order. */
  equals(other: unknown): boolean {
    if (!(other instanceof CircularLinkedQueue) || other.size !== this.count) {
      return false;
    }
    const mine = this[Symbol.iterator]();
    for (const element of other) {
      if (mine.next().value !== element) {
        return false;
      }
    }
    return true;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    if (this.tail === null) {
      return;
    }
    let cursor = this.headNode();
    for (let k = 0; k < this.count; k++) {
      yield cursor.element;
      cursor = this.successor(cursor);
    }
  }

  toString(): string {
    return describeItems('CircularLinkedQueue', this);
  }

  private tailNode(): SinglyNode<T> {
    if (this.tail === null) {
      throw new EmptyError('Queue is empty');
    }
    return this.tail;
  }

  private headNode(): SinglyNode<T> {
    return this.successor(this.tailNode());
  }

  // No anel nenhum next é null; se for, a estrutura foi corrompida
  private successor(node: SinglyNode<T>): SinglyNode<T> {
    if (node.next === null) {
      throw new Error('Queue ring is broken');
    }
    return node.next;
  }
}
