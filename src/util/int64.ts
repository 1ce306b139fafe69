import { Int64RangeError } from '../errors';
import type { Int64 } from '../types';

export const INT64_MIN: Int64 = -(2n ** 63n);
export const INT64_MAX: Int64 = 2n ** 63n - 1n;

export const isInt64 = (value: bigint): boolean => BigInt.asIntN(64, value) === value;

export function assertInt64(value: bigint): Int64 {
  if (!isInt64(value)) throw new Int64RangeError(value);
  return value;
}
