import type { CursorOptions, Int64, IndexedLongSource } from '../types';
import { BaseLongCursor } from './baseCursor';

/**
 * Walks an {@link IndexedLongSource} from index 0 upwards.
 */
export class IndexedLongCursor extends BaseLongCursor {
  readonly supportsRemove = true;
  private readonly _items: IndexedLongSource;
  private _index = 0;
  private _lastIndex = -1;

  constructor(items: IndexedLongSource, options?: CursorOptions) {
    super(items, options);
    this._items = items;
  }

  protected peek(): boolean {
    return this._index < this._items.size;
  }

  protected advance(): Int64 {
    const value = this._items.get(this._index);
    this._lastIndex = this._index++;
    return value;
  }

  protected removeLast(): void {
    this._items.removeAt(this._lastIndex);
    // Later elements shift down one slot.
    this._index = this._lastIndex;
    this._lastIndex = -1;
  }
}
