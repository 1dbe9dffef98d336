import { describe, it, expect } from 'vitest';
import {
  ArrayDeque,
  ArrayQueue,
  ArrayStack,
  CircularDeque,
  CircularLinkedQueue,
  CircularQueue,
  EmptyError,
  FullError,
  LinkedDeque,
  LinkedQueue,
  LinkedStack,
} from '../src/index.js';

describe('LinkedDeque', () => {
  it('adds and removes at both ends', () => {
    const deque = new LinkedDeque<number>();
    deque.addLast(2);
    deque.addFirst(1);
    deque.addLast(3);

    expect([...deque]).toEqual([1, 2, 3]);
    expect(deque.first()).toBe(1);
    expect(deque.last()).toBe(3);
    expect(deque.deleteFirst()).toBe(1);
    expect(deque.deleteLast()).toBe(3);
    expect(deque.size).toBe(1);
    expect(deque.toString()).toBe('2');
  });

  it('throws EmptyError on reads and removals when empty', () => {
    const deque = new LinkedDeque<string>();
    expect(deque.isEmpty()).toBe(true);
    expect(() => deque.first()).toThrow(EmptyError);
    expect(() => deque.last()).toThrow(EmptyError);
    expect(() => deque.deleteFirst()).toThrow(EmptyError);
    expect(() => deque.deleteLast()).toThrow(EmptyError);
  });

  it('drains back to empty', () => {
    const deque = new LinkedDeque<number>();
    deque.addFirst(1);
    deque.deleteLast();
    expect(deque.isEmpty()).toBe(true);
    deque.addFirst(2);
    expect(deque.last()).toBe(2);
  });
});

describe('ArrayStack', () => {
  it('is last-in, first-out', () => {
    const stack = new ArrayStack<number>();
    stack.push(1);
    stack.push(2);
    stack.push(3);

    expect(stack.top()).toBe(3);
    expect([...stack]).toEqual([3, 2, 1]);
    expect(stack.toString()).toBe('1 2 3');
    expect(stack.pop()).toBe(3);
    expect(stack.pop()).toBe(2);
    expect(stack.size).toBe(1);
  });

  it('throws EmptyError on top() and pop() when empty', () => {
    const stack = new ArrayStack<number>();
    expect(() => stack.top()).toThrow(EmptyError);
    expect(() => stack.pop()).toThrow('Stack is empty');
    expect(stack.size).toBe(0);
  });
});

describe('ArrayQueue', () => {
  it('is first-in, first-out', () => {
    const queue = new ArrayQueue<string>();
    queue.enqueue('a');
    queue.enqueue('b');
    expect(queue.first()).toBe('a');
    expect(queue.dequeue()).toBe('a');
    expect(queue.dequeue()).toBe('b');
    expect(queue.isEmpty()).toBe(true);
    expect(() => queue.dequeue()).toThrow(EmptyError);
  });

  it('defaults to 10 slots', () => {
    expect(new ArrayQueue().capacity).toBe(10);
  });

  it('doubles when full and halves at a quarter, down to the initial capacity', () => {
    const queue = new ArrayQueue<number>({ initialCapacity: 2 });
    for (let i = 1; i <= 5; i++) queue.enqueue(i);
    expect(queue.capacity).toBe(8);
    expect([...queue]).toEqual([1, 2, 3, 4, 5]);

    queue.dequeue();
    queue.dequeue();
    expect(queue.capacity).toBe(8);
    queue.dequeue();
    expect(queue.capacity).toBe(4);
    queue.dequeue();
    expect(queue.capacity).toBe(2);
    expect(queue.dequeue()).toBe(5);
    expect(queue.capacity).toBe(2);
  });

  it('keeps order when the front wraps around before growing', () => {
    const queue = new ArrayQueue<number>({ initialCapacity: 3 });
    queue.enqueue(1);
    queue.enqueue(2);
    queue.dequeue();
    queue.enqueue(3);
    queue.enqueue(4);
    queue.enqueue(5);
    expect([...queue]).toEqual([2, 3, 4, 5]);
    expect(queue.capacity).toBe(6);
  });

  it('rejects a non-positive initial capacity', () => {
    expect(() => new ArrayQueue({ initialCapacity: 0 })).toThrow(RangeError);
    expect(() => new ArrayQueue({ initialCapacity: 1.5 })).toThrow(
      'initialCapacity must be a positive integer, got 1.5',
    );
  });
});

describe('CircularQueue', () => {
  it('throws FullError at capacity and accepts again after a dequeue', () => {
    const queue = new CircularQueue<number>({ capacity: 2 });
    queue.enqueue(1);
    queue.enqueue(2);
    expect(queue.isFull()).toBe(true);
    expect(() => queue.enqueue(3)).toThrow(FullError);

    expect(queue.dequeue()).toBe(1);
    queue.enqueue(3);
    expect([...queue]).toEqual([2, 3]);
    expect(queue.capacity).toBe(2);
  });

  it('throws EmptyError when empty', () => {
    const queue = new CircularQueue<number>();
    expect(queue.capacity).toBe(10);
    expect(() => queue.first()).toThrow(EmptyError);
    expect(() => queue.dequeue()).toThrow(EmptyError);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new CircularQueue({ capacity: -1 })).toThrow(RangeError);
  });
});

describe('ArrayDeque', () => {
  it('adds and removes at both ends', () => {
    const deque = new ArrayDeque<number>();
    deque.addLast(2);
    deque.addFirst(1);
    deque.addLast(3);

    expect([...deque]).toEqual([1, 2, 3]);
    expect(deque.first()).toBe(1);
    expect(deque.last()).toBe(3);
    expect(deque.deleteLast()).toBe(3);
    expect(deque.deleteFirst()).toBe(1);
    expect([...deque]).toEqual([2]);
  });

  it('grows when full and shrinks back to the initial capacity', () => {
    const deque = new ArrayDeque<number>({ initialCapacity: 2 });
    deque.addLast(1);
    deque.addFirst(0);
    expect(deque.capacity).toBe(2);
    deque.addLast(2);
    expect(deque.capacity).toBe(4);
    expect([...deque]).toEqual([0, 1, 2]);

    expect(deque.deleteLast()).toBe(2);
    expect(deque.capacity).toBe(4);
    expect(deque.deleteFirst()).toBe(0);
    expect(deque.capacity).toBe(2);
    expect(deque.last()).toBe(1);
  });

  it('throws EmptyError when empty', () => {
    const deque = new ArrayDeque<number>();
    expect(() => deque.first()).toThrow('Deque is empty');
    expect(() => deque.last()).toThrow(EmptyError);
    expect(() => deque.deleteFirst()).toThrow(EmptyError);
    expect(() => deque.deleteLast()).toThrow(EmptyError);
  });

  it('rejects a non-positive initial capacity', () => {
    expect(() => new ArrayDeque({ initialCapacity: 0 })).toThrow(RangeError);
  });
});

describe('CircularDeque', () => {
  it('wraps around in both directions', () => {
    const deque = new CircularDeque<number>({ capacity: 3 });
    deque.addFirst(1);
    deque.addLast(2);
    deque.addFirst(0);

    expect([...deque]).toEqual([0, 1, 2]);
    expect(deque.isFull()).toBe(true);
    expect(deque.deleteLast()).toBe(2);
    expect(deque.deleteFirst()).toBe(0);
    expect([...deque]).toEqual([1]);
  });

  it('throws FullError at capacity without changing contents', () => {
    const deque = new CircularDeque<string>({ capacity: 2 });
    deque.addLast('a');
    deque.addLast('b');

    expect(() => deque.addLast('c')).toThrow(FullError);
    expect(() => deque.addFirst('c')).toThrow('Deque is full');
    expect(deque.size).toBe(2);
    expect([...deque]).toEqual(['a', 'b']);
  });

  it('defaults to ten slots', () => {
    expect(new CircularDeque().capacity).toBe(10);
  });

  it('throws EmptyError when empty', () => {
    const deque = new CircularDeque<number>();
    expect(() => deque.first()).toThrow(EmptyError);
    expect(() => deque.deleteLast()).toThrow(EmptyError);
  });
});

describe('LinkedStack', () => {
  it('pushes many with the last item on top', () => {
    const stack = new LinkedStack<number>();
    stack.pushMany([1, 2, 3]);

    expect(stack.top()).toBe(3);
    expect([...stack]).toEqual([3, 2, 1]);
    expect(stack.toString()).toBe('LinkedStack([3, 2, 1])');
  });

  it('pops many in removal order', () => {
    const stack = new LinkedStack([1, 2, 3, 4]);
    expect(stack.popMany(3)).toEqual([4, 3, 2]);
    expect(stack.size).toBe(1);
    expect(stack.popMany(0)).toEqual([]);
    expect(stack.top()).toBe(1);
  });

  it('rejects popMany counts out of range', () => {
    const stack = new LinkedStack([1, 2]);
    expect(() => stack.popMany(5)).toThrow('Cannot pop 5 elements from stack of size 2');
    expect(() => stack.popMany(-1)).toThrow(RangeError);
    expect(stack.size).toBe(2);
    expect(() => new LinkedStack<number>().popMany(0)).toThrow(EmptyError);
  });

  it('reverses in place', () => {
    const stack = new LinkedStack([1, 2, 3]);
    stack.reverse();
    expect([...stack]).toEqual([1, 2, 3]);
    expect(stack.pop()).toBe(1);
  });

  it('copies into an independent stack', () => {
    const stack = new LinkedStack(['a', 'b']);
    const copy = stack.copy();
    copy.push('c');

    expect([...copy]).toEqual(['c', 'b', 'a']);
    expect([...stack]).toEqual(['b', 'a']);
    expect(stack.toString()).toBe('LinkedStack(["b", "a"])');
  });

  it('clears and throws EmptyError afterwards', () => {
    const stack = new LinkedStack([1, 2]);
    stack.clear();
    expect(stack.isEmpty()).toBe(true);
    expect(() => stack.pop()).toThrow('Stack is empty');
    expect(() => stack.top()).toThrow(EmptyError);
  });
});

describe('LinkedQueue', () => {
  it('is first-in, first-out', () => {
    const queue = new LinkedQueue<number>();
    queue.enqueueMany([1, 2, 3]);

    expect(queue.first()).toBe(1);
    expect(queue.last()).toBe(3);
    expect(queue.dequeue()).toBe(1);
    expect(queue.toString()).toBe('LinkedQueue([2, 3])');
  });

  it('dequeues many front first', () => {
    const queue = new LinkedQueue([1, 2, 3]);
    expect(queue.dequeueMany(2)).toEqual([1, 2]);
    expect(queue.first()).toBe(3);
    expect(queue.last()).toBe(3);
    expect(queue.dequeueMany(1)).toEqual([3]);
    expect(queue.isEmpty()).toBe(true);
    expect(() => queue.last()).toThrow(EmptyError);
  });

  it('rejects dequeueMany counts out of range', () => {
    const queue = new LinkedQueue([1]);
    expect(() => queue.dequeueMany(2)).toThrow('Cannot dequeue 2 elements from queue of size 1');
    expect(() => queue.dequeueMany(0.5)).toThrow(RangeError);
    expect(() => new LinkedQueue<number>().dequeueMany(1)).toThrow('Queue is empty');
  });

  it('reverses in place and keeps enqueue at the new tail', () => {
    const queue = new LinkedQueue([1, 2, 3]);
    queue.reverse();
    expect([...queue]).toEqual([3, 2, 1]);
    expect(queue.last()).toBe(1);
    queue.enqueue(0);
    expect([...queue]).toEqual([3, 2, 1, 0]);
  });

  it('accepts an enqueue after draining', () => {
    const queue = new LinkedQueue([1]);
    queue.dequeue();
    queue.enqueue(2);
    expect(queue.first()).toBe(2);
    expect(queue.last()).toBe(2);
  });

  it('copies into an independent queue', () => {
    const queue = new LinkedQueue([1, 2]);
    const copy = queue.copy();
    copy.dequeue();
    expect([...queue]).toEqual([1, 2]);
    expect([...copy]).toEqual([2]);
    queue.clear();
    expect(queue.size).toBe(0);
    expect(copy.size).toBe(1);
  });
});

describe('CircularLinkedQueue', () => {
  it('is first-in, first-out', () => {
    const queue = new CircularLinkedQueue<string>();
    queue.enqueue('a');
    queue.enqueue('b');

    expect(queue.first()).toBe('a');
    expect(queue.last()).toBe('b');
    expect(queue.dequeue()).toBe('a');
    expect(queue.dequeue()).toBe('b');
    expect(queue.isEmpty()).toBe(true);
    expect(() => queue.first()).toThrow(EmptyError);
  });

  it('rotates the front element to the back', () => {
    const queue = new CircularLinkedQueue([1, 2, 3]);
    queue.rotate();
    expect([...queue]).toEqual([2, 3, 1]);
    expect(queue.last()).toBe(1);
    queue.rotate();
    queue.rotate();
    expect([...queue]).toEqual([1, 2, 3]);
  });

  it('treats rotate as a no-op below two elements', () => {
    const queue = new CircularLinkedQueue<number>();
    queue.rotate();
    queue.enqueue(7);
    queue.rotate();
    expect(queue.first()).toBe(7);
    expect(queue.last()).toBe(7);
  });

  it('enqueues and dequeues many', () => {
    const queue = new CircularLinkedQueue<number>();
    queue.enqueueMany([1, 2, 3, 4]);
    expect(queue.dequeueMany(3)).toEqual([1, 2, 3]);
    expect([...queue]).toEqual([4]);
    expect(() => queue.dequeueMany(2)).toThrow('Cannot dequeue 2 elements from queue of size 1');
  });

  it('reverses the ring in place', () => {
    const queue = new CircularLinkedQueue([1, 2, 3]);
    queue.reverse();
    expect([...queue]).toEqual([3, 2, 1]);
    expect(queue.first()).toBe(3);
    expect(queue.last()).toBe(1);
    queue.enqueue(0);
    expect(queue.toString()).toBe('CircularLinkedQueue([3, 2, 1, 0])');
  });

  it('compares by size and elements in order', () => {
    const queue = new CircularLinkedQueue([1, 2, 3]);
    const copy = queue.copy();
    expect(queue.equals(copy)).toBe(true);

    copy.rotate();
    expect(queue.equals(copy)).toBe(false);
    copy.dequeue();
    expect(queue.equals(copy)).toBe(false);
    expect(queue.equals(new LinkedQueue([1, 2, 3]))).toBe(false);
    expect(new CircularLinkedQueue().equals(new CircularLinkedQueue())).toBe(true);
  });
});
