import { EmptyError } from './errors.js';
import type { Stack } from './types.js';

/** Stack backed by a JS array; the end of the array is the top. */
export class ArrayStack<T> implements Stack<T> {
  private readonly data: T[] = [];

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(element: T): void {
    this.data.push(element);
  }

  top(): T {
    if (this.data.length === 0) {
      throw new EmptyError('Stack is empty');
    }
    return this.data[this.data.length - 1];
  }

  pop(): T {
    const element = this.top();
    this.data.length--;
    return element;
  }

  /** Top to bottom. */
  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = this.data.length - 1; i >= 0; i--) {
      yield this.data[i];
    }
  }

  /** Bottom to top, e.g. `1 2 3` after pushing 1, 2, 3. */
  toString(): string {
    return this.data.map((element) => String(element)).join(' ');
  }
}
