import { EmptyError } from './errors.js';

/** Nó de lista simplesmente encadeada; `next` null marca o fim (ou só existe o nó, na circular) */
export interface SinglyNode<T> {
  element: T;
  next: SinglyNode<T> | null;
}

interface TakeManyOptions {
  // 'pop' | 'dequeue', usado nas mensagens
  verb: string;
  // 'Stack' | 'Queue'
  noun: string;
  size: number;
}

/**
 * Remove `n` elementos chamando `take` e devolve na ordem de remoção.
 * Contêiner vazio lança EmptyError antes de olhar `n`.
 */
export function takeMany<T>(n: number, options: TakeManyOptions, take: () => T): T[] {
  const { verb, noun, size } = options;
  if (size === 0) {
    throw new EmptyError(`${noun} is empty`);
  }
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Number of elements to ${verb} must be a non-negative integer, got ${n}`);
  }
  if (n > size) {
    throw new RangeError(`Cannot ${verb} ${n} elements from ${noun.toLowerCase()} of size ${size}`);
  }
  const taken: T[] = [];
  for (let k = 0; k < n; k++) {
    taken.push(take());
  }
  return taken;
}

/** `Name([a, b, c])`, strings entre aspas como em PositionalList.inspect */
export function describeItems(name: string, items: Iterable<unknown>): string {
  const parts = Array.from(items, (element) =>
    typeof element === 'string' ? JSON.stringify(element) : String(element),
  );
  return `${name}([${parts.join(', ')}])`;
}
