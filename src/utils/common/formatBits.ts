import { type ShiftState } from '@/types/types';

/**
 * @notice Renders a value as its 32-bit unsigned binary representation, zero padded
 */
export function toUnsignedBitString(value: number) {
  return (value >>> 0).toString(2).padStart(32, '0');
}

export function formatShiftState({ a, b, c, d }: ShiftState) {
  return `{${a},${b},${c},${d}}`;
}
