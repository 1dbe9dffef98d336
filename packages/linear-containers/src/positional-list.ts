import { InvalidPositionError, StalePositionError, WrongPositionTypeError } from './errors.js';
import { ElementNode, LinkedSequence } from './linked-sequence.js';
import type { ChainNode } from './linked-sequence.js';
import { Position, createPosition, positionNode, positionOwner } from './position.js';

/**
 * Sequência de elementos com acesso por posição.
 *
 * Estrutura interna:
 * - chain: lista duplamente encadeada com sentinelas (dona de todos os nós)
 * - Position: handle externo que aponta para um nó, validado a cada uso
 *
 * Toda operação que recebe uma Position valida antes de mexer na estrutura,
 * então um erro de posição nunca deixa a lista parcialmente alterada.
 */
export class PositionalList<T> implements Iterable<T> {
  private readonly chain = new LinkedSequence<T>();

  /** Builds a list holding the elements of `items`, in order. */
  static from<T>(items: Iterable<T>): PositionalList<T> {
    const list = new PositionalList<T>();
    for (const item of items) {
      list.addLast(item);
    }
    return list;
  }

  get size(): number {
    return this.chain.size;
  }

  isEmpty(): boolean {
    return this.chain.isEmpty();
  }

  // ─── Navigation ────────────────────────────────────────────

  /** First position, or `null` when the list is empty. */
  first(): Position<T> | null {
    return this.makePosition(this.chain.header.next);
  }

  /** Last position, or `null` when the list is empty. */
  last(): Position<T> | null {
    return this.makePosition(this.chain.trailer.prev);
  }

  /** Position just before `p`, or `null` when `p` is first. */
  before(p: Position<T>): Position<T> | null {
    const node = this.validate(p);
    return this.makePosition(node.prev);
  }

  /** Position just after `p`, or `null` when `p` is last. */
  after(p: Position<T>): Position<T> | null {
    const node = this.validate(p);
    return this.makePosition(node.next);
  }

  // ─── Mutation ──────────────────────────────────────────────

  addFirst(element: T): Position<T> {
    return createPosition(this, this.chain.pushFront(element));
  }

  addLast(element: T): Position<T> {
    return createPosition(this, this.chain.pushBack(element));
  }

  addBefore(p: Position<T>, element: T): Position<T> {
    const node = this.validate(p);
    return this.insertBetween(element, node.prev, node);
  }

  addAfter(p: Position<T>, element: T): Position<T> {
    const node = this.validate(p);
    return this.insertBetween(element, node, node.next);
  }

  /**
   * Removes the element at `p` and returns it.
   * `p`, and every other position referring to the same element, becomes stale.
   */
  delete(p: Position<T>): T {
    const node = this.validate(p);
    return this.chain.deleteNode(node);
  }

  /**
   * Stores `element` at `p` and returns the element it held.
   * Unlike `delete`, `p` stays valid.
   */
  replace(p: Position<T>, element: T): T {
    const node = this.validate(p);
    const previous = node.element;
    node.element = element;
    return previous;
  }

  /** Removes every element. All outstanding positions become stale. */
  clear(): void {
    this.chain.clear();
  }

  // ─── Iteration ─────────────────────────────────────────────
  // Mutação estrutural durante a iteração lança ConcurrentModificationError.
  // replace() não é estrutural e pode ser chamado à vontade.

  *[Symbol.iterator](): IterableIterator<T> {
    for (const p of this.positions()) {
      yield p.element();
    }
  }

  /** Positions from first to last. */
  *positions(): IterableIterator<Position<T>> {
    const expected = this.chain.version;
    let cursor = this.first();
    while (cursor !== null) {
      yield cursor;
      this.chain.assertVersion(expected);
      cursor = this.after(cursor);
    }
  }

  /** Elements from last to first. */
  *reversed(): IterableIterator<T> {
    yield* this.chain.reversed();
  }

  toArray(): T[] {
    return [...this];
  }

  // ─── Diagnostics ───────────────────────────────────────────

  /** Elements in order, separated by a space. Not a serialization format. */
  toString(): string {
    return this.toArray()
      .map((element) => String(element))
      .join(' ');
  }

  /** Debug form, e.g. `PositionalList([5, 10, 20])`. */
  inspect(): string {
    const items = this.toArray().map((element) =>
      typeof element === 'string' ? JSON.stringify(element) : String(element),
    );
    return `PositionalList([${items.join(', ')}])`;
  }

  // ─── Internal ──────────────────────────────────────────────

  /**
   * Converte uma Position externa no nó interno, em três etapas:
   * 1. é mesmo uma Position?
   * 2. foi emitida por esta lista?
   * 3. o nó ainda está vivo?
   */
  private validate(p: Position<T>): ElementNode<T> {
    if (!(p instanceof Position)) {
      throw new WrongPositionTypeError();
    }
    if (positionOwner(p) !== this) {
      throw new InvalidPositionError();
    }
    const node = positionNode(p);
    if (node.detached) {
      throw new StalePositionError();
    }
    return node;
  }

  /** Sentinelas (e null) viram "sem posição": só ElementNode carrega elemento */
  private makePosition(node: ChainNode<T> | null): Position<T> | null {
    if (!(node instanceof ElementNode)) {
      return null;
    }
    return createPosition(this, node);
  }

  /** Valida os vizinhos vindos de ligações internas e cria a Position do nó novo */
  private insertBetween(
    element: T,
    predecessor: ChainNode<T> | null,
    successor: ChainNode<T> | null,
  ): Position<T> {
    if (predecessor === null || successor === null) {
      throw new StalePositionError('Neighbour node is detached');
    }
    const node = this.chain.insertBetween(element, predecessor, successor);
    return createPosition(this, node);
  }
}
