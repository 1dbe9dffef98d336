export { PositionalList } from './positional-list.js';
export { Position } from './position.js';
export { LinkedSequence } from './linked-sequence.js';
export { LinkedDeque } from './linked-deque.js';
export { ArrayStack } from './array-stack.js';
export { ArrayQueue } from './array-queue.js';
export { CircularQueue } from './circular-queue.js';
export { ArrayDeque } from './array-deque.js';
export { CircularDeque } from './circular-deque.js';
export { LinkedStack } from './linked-stack.js';
export { LinkedQueue } from './linked-queue.js';
export { CircularLinkedQueue } from './circular-linked-queue.js';
export { evaluatePostfix, evaluatePrefix, infixToPostfix, infixToPrefix } from './expression.js';
export {
  ConcurrentModificationError,
  ContainerError,
  EmptyError,
  ExpressionError,
  FullError,
  InvalidPositionError,
  StalePositionError,
  WrongPositionTypeError,
} from './errors.js';
export type { ContainerErrorCode } from './errors.js';
export type { ChainNode, ElementNode } from './linked-sequence.js';
export type {
  ArrayDequeOptions,
  ArrayQueueOptions,
  CircularDequeOptions,
  CircularQueueOptions,
  Container,
  Deque,
  Operator,
  Queue,
  Stack,
} from './types.js';
