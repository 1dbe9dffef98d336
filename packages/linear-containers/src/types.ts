/** Common surface of every linear container. */
export interface Container<T> extends Iterable<T> {
  readonly size: number;
  isEmpty(): boolean;
}

/** Last-in, first-out container. */
export interface Stack<T> extends Container<T> {
  push(element: T): void;
  /** Removes and returns the top element. Throws `EmptyError` when empty. */
  pop(): T;
  /** Returns the top element without removing it. Throws `EmptyError` when empty. */
  top(): T;
}

/** First-in, first-out container. */
export interface Queue<T> extends Container<T> {
  enqueue(element: T): void;
  /** Removes and returns the front element. Throws `EmptyError` when empty. */
  dequeue(): T;
  /** Returns the front element without removing it. Throws `EmptyError` when empty. */
  first(): T;
}

/** Double-ended queue. Reads and removals throw `EmptyError` when empty. */
export interface Deque<T> extends Container<T> {
  addFirst(element: T): void;
  addLast(element: T): void;
  first(): T;
  last(): T;
  deleteFirst(): T;
  deleteLast(): T;
}

export interface ArrayQueueOptions {
  /**
   * Slots allocated up front. The queue doubles when full and halves when a
   * quarter full, never shrinking below this value. Default: 10.
   */
  initialCapacity?: number;
}

export interface CircularQueueOptions {
  /** Fixed number of slots. `enqueue` throws `FullError` beyond it. Default: 10. */
  capacity?: number;
}

export interface ArrayDequeOptions {
  /** Same growth rule as {@link ArrayQueueOptions.initialCapacity}. Default: 10. */
  initialCapacity?: number;
}

export interface CircularDequeOptions {
  /** Fixed number of slots. Adds at either end throw `FullError` beyond it. Default: 10. */
  capacity?: number;
}

export type Operator = '+' | '-' | '*' | '/' | '^';
