import { EmptyError } from './errors.js';
import { ElementNode, LinkedSequence } from './linked-sequence.js';
import type { ChainNode } from './linked-sequence.js';
import type { Deque } from './types.js';

/**
 * Deque sobre a mesma cadeia com sentinelas da PositionalList.
 * Só usa as pontas: header.next é o primeiro, trailer.prev é o último.
 */
export class LinkedDeque<T> implements Deque<T> {
  private readonly chain = new LinkedSequence<T>();

  get size(): number {
    return this.chain.size;
  }

  isEmpty(): boolean {
    return this.chain.isEmpty();
  }

  first(): T {
    return this.endNode(this.chain.header.next).element;
  }

  last(): T {
    return this.endNode(this.chain.trailer.prev).element;
  }

  addFirst(element: T): void {
    this.chain.pushFront(element);
  }

  addLast(element: T): void {
    this.chain.pushBack(element);
  }

  deleteFirst(): T {
    return this.chain.deleteNode(this.endNode(this.chain.header.next));
  }

  deleteLast(): T {
    return this.chain.deleteNode(this.endNode(this.chain.trailer.prev));
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.chain[Symbol.iterator]();
  }

  toString(): string {
    return [...this.chain].map((element) => String(element)).join(' ');
  }

  /** Vizinho de uma sentinela; se for a outra sentinela, o deque está vazio */
  private endNode(node: ChainNode<T> | null): ElementNode<T> {
    if (!(node instanceof ElementNode)) {
      throw new EmptyError('Deque is empty');
    }
    return node;
  }
}
