import { ConcurrentModificationError, EmptyError, StalePositionError } from './errors.js';

/** Nó só com ligações. As duas sentinelas são instâncias diretas desta classe. */
export class ChainNode<T> {
  prev: ChainNode<T> | null = null;
  next: ChainNode<T> | null = null;
}

/**
 * Nó que carrega um elemento. `next === null` marca um nó já removido.
 * O elemento fica numa caixa que é descartada na remoção, então uma Position
 * velha não mantém o elemento vivo.
 */
export class ElementNode<T> extends ChainNode<T> {
  private slot: { value: T } | null;

  constructor(element: T, prev: ChainNode<T>, next: ChainNode<T>) {
    super();
    this.slot = { value: element };
    this.prev = prev;
    this.next = next;
  }

  get element(): T {
    if (this.slot === null) {
      throw new StalePositionError();
    }
    return this.slot.value;
  }

  set element(value: T) {
    if (this.slot === null) {
      throw new StalePositionError();
    }
    this.slot.value = value;
  }

  get detached(): boolean {
    return this.next === null;
  }

  /** Desliga o nó da cadeia e solta o elemento */
  release(): void {
    this.prev = null;
    this.next = null;
    this.slot = null;
  }
}

/**
 * Lista duplamente encadeada delimitada por duas sentinelas.
 * header -> ... -> trailer, sempre percorrível nos dois sentidos.
 * Inserção e remoção são O(1) e nunca precisam tratar lista vazia à parte.
 */
export class LinkedSequence<T> {
  readonly header = new ChainNode<T>();
  readonly trailer = new ChainNode<T>();

  private count = 0;
  // Incrementado a cada mudança estrutural; iteradores comparam para detectar mutação
  private generation = 0;

  constructor() {
    this.header.next = this.trailer;
    this.trailer.prev = this.header;
  }

  get size(): number {
    return this.count;
  }

  get version(): number {
    return this.generation;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Cria um nó entre `predecessor` e `successor` e devolve o nó novo.
   * Não valida adjacência: quem chama garante que os dois são vizinhos.
   */
  insertBetween(element: T, predecessor: ChainNode<T>, successor: ChainNode<T>): ElementNode<T> {
    const node = new ElementNode(element, predecessor, successor);
    predecessor.next = node;
    successor.prev = node;
    this.count++;
    this.generation++;
    return node;
  }

  /** Insere logo após o header */
  pushFront(element: T): ElementNode<T> {
    const successor = this.header.next;
    if (successor === null) {
      throw new StalePositionError('Header sentinel is unlinked');
    }
    return this.insertBetween(element, this.header, successor);
  }

  /** Insere logo antes do trailer */
  pushBack(element: T): ElementNode<T> {
    const predecessor = this.trailer.prev;
    if (predecessor === null) {
      throw new StalePositionError('Trailer sentinel is unlinked');
    }
    return this.insertBetween(element, predecessor, this.trailer);
  }

  /** Remove o nó da cadeia, solta ligações e elemento, e devolve o elemento */
  deleteNode(node: ElementNode<T>): T {
    if (this.isEmpty()) {
      throw new EmptyError('Cannot delete from an empty list');
    }
    const { prev, next } = node;
    if (prev === null || next === null) {
      throw new StalePositionError('Node was already removed');
    }
    prev.next = next;
    next.prev = prev;
    this.count--;
    this.generation++;
    const element = node.element;
    node.release();
    return element;
  }

  /** Desliga todos os nós vivos; qualquer Position que aponte para eles fica inválida */
  clear(): void {
    let cursor = this.header.next;
    while (cursor instanceof ElementNode) {
      const next: ChainNode<T> | null = cursor.next;
      cursor.release();
      cursor = next;
    }
    this.header.next = this.trailer;
    this.trailer.prev = this.header;
    this.count = 0;
    this.generation++;
  }

  /** Lança ConcurrentModificationError se a cadeia mudou desde `expected` */
  assertVersion(expected: number): void {
    if (this.generation !== expected) {
      throw new ConcurrentModificationError();
    }
  }

  /** Do primeiro ao último elemento. Mutação estrutural no meio interrompe a iteração. */
  *[Symbol.iterator](): IterableIterator<T> {
    const expected = this.generation;
    let cursor = this.header.next;
    while (cursor instanceof ElementNode) {
      yield cursor.element;
      this.assertVersion(expected);
      cursor = cursor.next;
    }
  }

  /** Do último ao primeiro elemento */
  *reversed(): IterableIterator<T> {
    const expected = this.generation;
    let cursor = this.trailer.prev;
    while (cursor instanceof ElementNode) {
      yield cursor.element;
      this.assertVersion(expected);
      cursor = cursor.prev;
    }
  }
}
