import { EmptyError } from './errors.js';

/** Lança RangeError se a capacidade não for um inteiro positivo */
export function assertCapacity(capacity: number, label = 'capacity'): number {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new RangeError(`${label} must be a positive integer, got ${capacity}`);
  }
  return capacity;
}

/**
 * Buffer circular de tamanho fixo, base das filas e deques em array.
 * front = índice do primeiro elemento; o próximo slot livre no fim é (front + count) % capacity.
 * Quem decide crescer, encolher ou recusar quando cheio é o container que usa o buffer.
 */
export class RingBuffer<T> {
  private data: T[];
  private front = 0;
  private count = 0;

  constructor(
    capacity: number,
    // Usado na mensagem de EmptyError: 'Queue is empty', 'Deque is empty'
    private readonly label = 'Queue',
  ) {
    this.data = new Array<T>(assertCapacity(capacity));
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.data.length;
  }

  isFull(): boolean {
    return this.count === this.data.length;
  }

  /** Chamador garante que há espaço */
  push(element: T): void {
    const avail = (this.front + this.count) % this.data.length;
    this.data[avail] = element;
    this.count++;
  }

  /** Chamador garante que há espaço */
  unshift(element: T): void {
    this.front = (this.front - 1 + this.data.length) % this.data.length;
    this.data[this.front] = element;
    this.count++;
  }

  peek(): T {
    this.assertNotEmpty();
    return this.data[this.front];
  }

  peekLast(): T {
    this.assertNotEmpty();
    return this.data[this.lastIndex()];
  }

  shift(): T {
    const element = this.peek();
    // Solta a referência para o GC
    delete this.data[this.front];
    this.front = (this.front + 1) % this.data.length;
    this.count--;
    return element;
  }

  pop(): T {
    const element = this.peekLast();
    delete this.data[this.lastIndex()];
    this.count--;
    return element;
  }

  /** Dobra a capacidade se estiver cheio */
  grow(): void {
    if (this.isFull()) {
      this.resize(this.data.length * 2);
    }
  }

  /** Encolhe pela metade com 1/4 de ocupação, sem passar de `floor` */
  shrink(floor: number): void {
    const half = Math.floor(this.data.length / 2);
    if (half >= floor && this.count <= this.data.length / 4) {
      this.resize(half);
    }
  }

  /** Realoca com a nova capacidade e realinha o primeiro elemento no índice 0 */
  resize(capacity: number): void {
    const next = new Array<T>(assertCapacity(capacity));
    for (let k = 0; k < this.count; k++) {
      next[k] = this.data[(this.front + k) % this.data.length];
    }
    this.data = next;
    this.front = 0;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let k = 0; k < this.count; k++) {
      yield this.data[(this.front + k) % this.data.length];
    }
  }

  private lastIndex(): number {
    return (this.front + this.count - 1) % this.data.length;
  }

  private assertNotEmpty(): void {
    if (this.count === 0) {
      throw new EmptyError(`${this.label} is empty`);
    }
  }
}
