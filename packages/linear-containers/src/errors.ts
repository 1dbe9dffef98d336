export type ContainerErrorCode =
  | 'EMPTY'
  | 'FULL'
  | 'INVALID_POSITION'
  | 'WRONG_POSITION_TYPE'
  | 'STALE_POSITION'
  | 'CONCURRENT_MODIFICATION'
  | 'EXPRESSION';

/**
 * Base class for every error thrown by the containers.
 * All of them are precondition violations: the structure is left untouched.
 */
export class ContainerError extends Error {
  constructor(
    message: string,
    public readonly code: ContainerErrorCode,
  ) {
    super(message);
    this.name = 'ContainerError';
    // Garante que instanceof funcione mesmo após transpilar para ES5/CJS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Read or remove on a container with no elements. */
export class EmptyError extends ContainerError {
  constructor(message = 'Container is empty') {
    super(message, 'EMPTY');
    this.name = 'EmptyError';
  }
}

/** Add on a fixed-capacity container that is already at capacity. */
export class FullError extends ContainerError {
  constructor(message = 'Container is full') {
    super(message, 'FULL');
    this.name = 'FullError';
  }
}

/** The position was issued by a different list. */
export class InvalidPositionError extends ContainerError {
  constructor(message = 'Position does not belong to this container') {
    super(message, 'INVALID_POSITION');
    this.name = 'InvalidPositionError';
  }
}

/** The value passed where a position was expected is not a position. */
export class WrongPositionTypeError extends ContainerError {
  constructor(message = 'Expected a Position') {
    super(message, 'WRONG_POSITION_TYPE');
    this.name = 'WrongPositionTypeError';
  }
}

/** The node behind the position has been deleted. */
export class StalePositionError extends ContainerError {
  constructor(message = 'Position is no longer valid') {
    super(message, 'STALE_POSITION');
    this.name = 'StalePositionError';
  }
}

export class ConcurrentModificationError extends ContainerError {
  constructor(message = 'Container was modified during iteration') {
    super(message, 'CONCURRENT_MODIFICATION');
    this.name = 'ConcurrentModificationError';
  }
}

export class ExpressionError extends ContainerError {
  constructor(
    message: string,
    /** Zero-based index of the offending character, when known. */
    public readonly index?: number,
  ) {
    super(message, 'EXPRESSION');
    this.name = 'ExpressionError';
  }
}
