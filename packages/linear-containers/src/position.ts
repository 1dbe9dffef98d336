import type { ElementNode } from './linked-sequence.js';

// Canal interno com a PositionalList. index.ts não reexporta estas funções,
// então o nó por trás de uma Position nunca chega ao código cliente.
type Create = <T>(owner: object, node: ElementNode<T>) => Position<T>;
type ReadOwner = <T>(p: Position<T>) => object;
type ReadNode = <T>(p: Position<T>) => ElementNode<T>;

const uninitialised = (): never => {
  throw new Error('Position accessors are not initialised');
};
// Preenchidos pelo bloco estático da classe
let create: Create = uninitialised;
let readOwner: ReadOwner = uninitialised;
let readNode: ReadNode = uninitialised;

/**
 * Opaque handle to one element of a {@link PositionalList}.
 *
 * A position stays valid across insertions, `replace` and deletions of other
 * elements. It becomes stale the moment its own element is deleted; any later
 * use throws `StalePositionError`.
 */
export class Position<T> {
  readonly #owner: object;
  readonly #node: ElementNode<T>;

  private constructor(owner: object, node: ElementNode<T>) {
    this.#owner = owner;
    this.#node = node;
  }

  static {
    create = <U>(owner: object, node: ElementNode<U>): Position<U> => new Position(owner, node);
    readOwner = <U>(p: Position<U>): object => p.#owner;
    readNode = <U>(p: Position<U>): ElementNode<U> => p.#node;
  }

  /** The element stored at this position. */
  element(): T {
    return this.#node.element;
  }

  /** `true` while the element behind this position has not been deleted. */
  isValid(): boolean {
    return !this.#node.detached;
  }

  /** Two positions are equal when they refer to the same node, whatever their elements. */
  equals(other: unknown): boolean {
    return other instanceof Position && other.#node === this.#node;
  }
}

/** Emite uma Position para `node` em nome de `owner` */
export function createPosition<T>(owner: object, node: ElementNode<T>): Position<T> {
  return create(owner, node);
}

/** Lista que emitiu a Position */
export function positionOwner<T>(p: Position<T>): object {
  return readOwner(p);
}

/** Nó interno da Position (vivo ou já removido) */
export function positionNode<T>(p: Position<T>): ElementNode<T> {
  return readNode(p);
}
