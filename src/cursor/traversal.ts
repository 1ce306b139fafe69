// Consumers that only speak to a cursor through hasMore/next/remove.

import { UnsupportedOperationError } from '../errors';
import type { Int64, LongCursor } from '../types';

function requireRemoval(cursor: LongCursor) {
  if (!cursor.supportsRemove) throw new UnsupportedOperationError();
}

/**
 * Returns the remaining values in traversal order, leaving the cursor exhausted.
 */
export function drain(cursor: LongCursor): Int64[] {
  const values: Int64[] = [];
  while (cursor.hasMore()) {
    values.push(cursor.next());
  }
  return values;
}

/**
 * Advances until `value` is returned. The cursor is left just past the match,
 * or exhausted.
 */
export function contains(cursor: LongCursor, value: Int64): boolean {
  while (cursor.hasMore()) {
    if (cursor.next() === value) return true;
  }
  return false;
}

export function removeValue(cursor: LongCursor, value: Int64): boolean {
  requireRemoval(cursor);
  while (cursor.hasMore()) {
    if (cursor.next() === value) {
      cursor.remove();
      return true;
    }
  }
  return false;
}

/**
 * Removes every remaining value matching `predicate` and returns how many went.
 */
export function removeWhere(cursor: LongCursor, predicate: (value: Int64) => boolean): number {
  requireRemoval(cursor);
  let removed = 0;
  while (cursor.hasMore()) {
    if (predicate(cursor.next())) {
      cursor.remove();
      removed++;
    }
  }
  return removed;
}

export function formatCursor(cursor: LongCursor): string {
  return `[${drain(cursor).join(', ')}]`;
}
