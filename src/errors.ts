// long-cursor error types. Every failure a cursor reports is one of these,
// thrown synchronously to the caller that broke the precondition.

export type CursorErrorCode =
  | 'NO_SUCH_ELEMENT'
  | 'ILLEGAL_STATE'
  | 'UNSUPPORTED_OPERATION'
  | 'CONCURRENT_MODIFICATION'
  | 'INT64_RANGE';

/**
 * Base cursor error class. All cursor errors inherit from this.
 */
export class CursorError extends Error {
  readonly code: CursorErrorCode;
  constructor(code: CursorErrorCode, message?: string) {
    super(message);
    this.name = 'CursorError';
    this.code = code;
  }
}

/**
 * Thrown by `next()` once the cursor is exhausted.
 */
export class NoSuchElementError extends CursorError {
  constructor(message = 'No more elements') {
    super('NO_SUCH_ELEMENT', message);
    this.name = 'NoSuchElementError';
  }
}

/**
 * Thrown by `remove()` when it does not directly follow a successful `next()`.
 */
export class IllegalStateError extends CursorError {
  constructor(message = 'remove() must follow a successful next()') {
    super('ILLEGAL_STATE', message);
    this.name = 'IllegalStateError';
  }
}

/**
 * Thrown by `remove()` on cursors that cannot mutate their backing structure.
 */
export class UnsupportedOperationError extends CursorError {
  constructor(message = 'Cursor is read-only') {
    super('UNSUPPORTED_OPERATION', message);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Thrown when the backing structure was structurally changed by someone other
 * than the cursor after the cursor last touched it.
 */
export class ConcurrentModificationError extends CursorError {
  constructor(message = 'Backing structure was modified during traversal') {
    super('CONCURRENT_MODIFICATION', message);
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Thrown when a value handed to a cursor does not fit in a signed 64-bit integer.
 */
export class Int64RangeError extends CursorError {
  readonly value: bigint;
  constructor(value: bigint) {
    super('INT64_RANGE', `${value} is outside the signed 64-bit range`);
    this.name = 'Int64RangeError';
    this.value = value;
  }
}
