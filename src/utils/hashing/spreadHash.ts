import { type ShiftState } from '@/types/types';

/**
 * @notice Mixes the high bits of a hash code into the low bits
 * @dev h' = h ^ (h >>> a) ^ (h >>> b), then h' ^ (h' >>> c) ^ (h' >>> d), all unsigned
 */
export function spreadHash(h: number, { a, b, c, d }: ShiftState) {
  const mixed = (h ^ (h >>> a) ^ (h >>> b)) >>> 0;
  return (mixed ^ (mixed >>> c) ^ (mixed >>> d)) >>> 0;
}

/**
 * @notice Reduces a hash code to a bucket of a power-of-two table
 * @dev size is not checked here, run configuration guarantees a power of two
 */
export function bucketIndex(h: number, size: number) {
  return (h & (size - 1)) >>> 0;
}
