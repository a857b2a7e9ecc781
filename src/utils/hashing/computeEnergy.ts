import HASH_CONSTANTS from '@/constants/hashConstants';
import { type EnergyMode, type ShiftState } from '@/types/types';
import { readHashedCodes } from '@/utils/hashing/hashWordFile';
import { bucketIndex, spreadHash } from '@/utils/hashing/spreadHash';

/**
 * @notice Counts how many base hashes land in each bucket for a given state
 * @returns Map of bucket index to occupancy, occupied buckets only
 */
export function buildCollisionTable(
  baseHashes: readonly number[],
  state: ShiftState,
  size: number,
) {
  const table = new Map<number, number>();
  for (const h of baseHashes) {
    const bucket = bucketIndex(spreadHash(h, state), size);
    table.set(bucket, (table.get(bucket) ?? 0) + 1);
  }
  return table;
}

/**
 * @notice Energy of a state: collisions over all occupied buckets
 * @dev The first occupant of a bucket is free, every further occupant is one collision.
 * In `average` mode the sum is divided by the number of occupied buckets.
 */
export function computeEnergy(
  baseHashes: readonly number[],
  state: ShiftState,
  size: number,
  mode: EnergyMode = 'sum',
) {
  const table = buildCollisionTable(baseHashes, state, size);
  if (table.size === 0) return 0;

  let collisions = 0;
  for (const occupancy of table.values()) collisions += occupancy - 1;

  return mode === 'average' ? collisions / table.size : collisions;
}

/**
 * @notice Energies of one state at several table sizes, reading the hashed cache file once
 * @returns One energy per size, in order, each -1 if the file cannot be read
 */
export async function computeFileEnergies(
  hashedPath: string,
  state: ShiftState,
  sizes: readonly number[],
  mode: EnergyMode = 'sum',
) {
  const codes = await readHashedCodes(hashedPath);
  return sizes.map(size =>
    codes ? computeEnergy(codes, state, size, mode) : HASH_CONSTANTS.ENERGY_UNAVAILABLE,
  );
}

/**
 * @notice Energy of a state over the codes stored in a hashed cache file
 * @returns Energy, or -1 if the file cannot be read
 */
export async function computeFileEnergy(
  hashedPath: string,
  state: ShiftState,
  size: number,
  mode: EnergyMode = 'sum',
) {
  const [energy] = await computeFileEnergies(hashedPath, state, [size], mode);
  return energy;
}
