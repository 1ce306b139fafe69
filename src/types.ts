export type Int64 = bigint;

export type CursorState = 'fresh' | 'advanced' | 'exhausted';

export type CursorOptions = {
  /** Name attached to the cursor's log context. */
  label?: string;
};

/**
 * Single-pass, forward-only cursor over signed 64-bit integers.
 */
export type LongCursor = {
  /** True while at least one more element is available. Never throws. */
  hasMore(): boolean;
  /** Returns the next value and advances past it. */
  next(): Int64;
  /** Removes the value most recently returned by `next()` from the backing structure. */
  remove(): void;
  readonly supportsRemove: boolean;
  readonly state: CursorState;
};

export type RemovableLongCursor = LongCursor & { readonly supportsRemove: true };

export const isRemovable = (cursor: LongCursor): cursor is RemovableLongCursor =>
  cursor.supportsRemove;

/**
 * Structural change counter. Implementations bump it on every insertion,
 * removal or clear, whoever performs it.
 */
export interface ModificationTracked {
  readonly modCount: number;
}

/**
 * Positional backing structure, e.g. an array list of longs.
 */
export interface IndexedLongSource extends ModificationTracked {
  readonly size: number;
  get(index: number): Int64;
  removeAt(index: number): Int64;
}

export type LongLink = {
  readonly value: Int64;
  readonly next: LongLink | undefined;
};

/**
 * Chained backing structure, e.g. a linked list or a hash bucket chain.
 */
export interface LinkedLongSource extends ModificationTracked {
  first(): LongLink | undefined;
  unlink(link: LongLink): void;
}
