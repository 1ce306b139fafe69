import { IllegalStateError, NoSuchElementError } from '../errors';
import type { CursorOptions, Int64, LinkedLongSource, LongLink } from '../types';
import { BaseLongCursor } from './baseCursor';

/**
 * Follows the `next` links of a {@link LinkedLongSource}. The upcoming link is
 * resolved one step ahead, so `hasMore()` is a plain check.
 */
export class LinkedLongCursor extends BaseLongCursor {
  readonly supportsRemove = true;
  private readonly _chain: LinkedLongSource;
  private _upcoming: LongLink | undefined;
  private _previous: LongLink | undefined;

  constructor(chain: LinkedLongSource, options?: CursorOptions) {
    super(chain, options);
    this._chain = chain;
    this._upcoming = chain.first();
  }

  protected peek(): boolean {
    return this._upcoming !== undefined;
  }

  protected advance(): Int64 {
    const link = this._upcoming;
    // Unreachable: BaseLongCursor.next() only advances after peek() succeeded.
    if (!link) throw new NoSuchElementError();
    this._previous = link;
    this._upcoming = link.next;
    return link.value;
  }

  protected removeLast(): void {
    // Unreachable: BaseLongCursor.remove() only gets here in the advanced state.
    if (!this._previous) throw new IllegalStateError();
    this._chain.unlink(this._previous);
    this._previous = undefined;
  }
}
