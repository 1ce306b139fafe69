import {
  ConcurrentModificationError,
  IllegalStateError,
  NoSuchElementError,
  UnsupportedOperationError,
} from '../errors';
import type { CursorOptions, CursorState, Int64, LongCursor, ModificationTracked } from '../types';
import { getLogger, Logger } from './logger';

/**
 * Shared state machine for long cursors.
 *
 * Subclasses describe how to look ahead, step forward and delete the last
 * returned element; this class owns the precondition checks. A cursor starts
 * `fresh`, becomes `advanced` after each `next()`, drops back to `fresh` after
 * `remove()`, and latches `exhausted` the first time it finds nothing left.
 *
 * When a `source` is given its `modCount` is snapshotted and compared before
 * every `next()` and `remove()`; a mismatch means someone else changed the
 * structure and the cursor refuses to continue.
 */
export abstract class BaseLongCursor implements LongCursor {
  abstract readonly supportsRemove: boolean;
  protected readonly logger: Logger;
  private readonly _source?: ModificationTracked;
  private _expectedModCount: number;
  private _advanced = false;
  private _exhausted = false;

  protected constructor(source?: ModificationTracked, options: CursorOptions = {}) {
    this._source = source;
    this._expectedModCount = source ? source.modCount : 0;
    this.logger = getLogger({ cursor: options.label ?? this.constructor.name });
  }

  /** True if another element is reachable from the current position. */
  protected abstract peek(): boolean;

  /** Steps past and returns the upcoming element. Only called when `peek()` is true. */
  protected abstract advance(): Int64;

  /** Deletes the element returned by the last `advance()` from the backing structure. */
  protected removeLast(): void {
    throw new UnsupportedOperationError();
  }

  get state(): CursorState {
    if (this._advanced) return 'advanced';
    return this.hasMore() ? 'fresh' : 'exhausted';
  }

  hasMore(): boolean {
    if (this._exhausted) return false;
    if (this.peek()) return true;
    this._exhausted = true;
    return false;
  }

  next(): Int64 {
    if (this._exhausted) throw new NoSuchElementError();
    this.checkForComodification('next');
    if (!this.hasMore()) throw new NoSuchElementError();
    const value = this.advance();
    this._advanced = true;
    return value;
  }

  remove(): void {
    if (!this.supportsRemove) throw new UnsupportedOperationError();
    if (!this._advanced) throw new IllegalStateError();
    this.checkForComodification('remove');
    this.removeLast();
    this._advanced = false;
    // The cursor's own removal bumped modCount; adopt the new value.
    if (this._source) this._expectedModCount = this._source.modCount;
    this.logger.debug('Removed element from backing structure', { modCount: this._expectedModCount });
  }

  private checkForComodification(operation: 'next' | 'remove') {
    if (!this._source || this._source.modCount === this._expectedModCount) return;
    this.logger.debug('Backing structure changed during traversal', {
      operation,
      expected: this._expectedModCount,
      actual: this._source.modCount,
    });
    throw new ConcurrentModificationError();
  }
}
