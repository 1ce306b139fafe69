import { UnsupportedOperationError } from '../errors';
import type { CursorOptions, CursorState, Int64, LongCursor } from '../types';
import { assertInt64 } from '../util/int64';
import { BaseLongCursor } from './baseCursor';

type LongArray = readonly bigint[] | BigInt64Array;

/**
 * Read-only cursor over a slice of an array. The slice is copied up front, so
 * later writes to the caller's array do not reach the cursor.
 */
export class ArrayLongCursor extends BaseLongCursor {
  readonly supportsRemove = false;
  private readonly _values: BigInt64Array;
  private _index = 0;

  constructor(values: LongArray, offset = 0, length = values.length - offset, options?: CursorOptions) {
    super(undefined, options);
    const end = offset + length;
    if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || end > values.length) {
      throw new RangeError(`Slice [${offset}, ${end}) is outside an array of length ${values.length}`);
    }
    if (values instanceof BigInt64Array) {
      this._values = values.slice(offset, end);
    } else {
      // Check before copying: BigInt64Array.from wraps out-of-range values.
      for (let i = offset; i < end; i++) assertInt64(values[i]);
      this._values = BigInt64Array.from(values.slice(offset, end));
    }
  }

  protected peek(): boolean {
    return this._index < this._values.length;
  }

  protected advance(): Int64 {
    return this._values[this._index++];
  }
}

/**
 * Hides `remove()` of the wrapped cursor.
 */
export class ReadOnlyLongCursor implements LongCursor {
  readonly supportsRemove = false;
  private readonly _inner: LongCursor;

  constructor(inner: LongCursor) {
    this._inner = inner;
  }

  get state(): CursorState {
    return this._inner.state;
  }

  hasMore(): boolean {
    return this._inner.hasMore();
  }

  next(): Int64 {
    return this._inner.next();
  }

  remove(): void {
    throw new UnsupportedOperationError();
  }
}

export const emptyCursor = (): LongCursor => new ArrayLongCursor([]);

export const singletonCursor = (value: Int64): LongCursor => new ArrayLongCursor([value]);

export const arrayCursor = (values: LongArray, offset?: number, length?: number): LongCursor =>
  new ArrayLongCursor(values, offset, length);

export const readOnly = (cursor: LongCursor): LongCursor =>
  cursor instanceof ReadOnlyLongCursor ? cursor : new ReadOnlyLongCursor(cursor);
