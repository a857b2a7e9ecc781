import HASH_CONSTANTS from '@/constants/hashConstants';
import { z } from 'zod';

/**
 * @notice Schema for a single shift amount, valid for a 32-bit word
 */
export const shiftAmountSchema = z
  .number()
  .int()
  .min(HASH_CONSTANTS.MIN_SHIFT)
  .max(HASH_CONSTANTS.MAX_SHIFT);

/**
 * @notice Schema for the four shift amounts explored by the search
 */
export const shiftStateSchema = z.object({
  a: shiftAmountSchema,
  b: shiftAmountSchema,
  c: shiftAmountSchema,
  d: shiftAmountSchema,
});
export type ShiftState = Readonly<z.infer<typeof shiftStateSchema>>;
export type ShiftField = keyof ShiftState;

/**
 * @notice Supported base hash variants
 * @dev `polynomial` is the 31-multiplier hash, `additive` sums character codes
 */
export const hashVariantSchema = z.enum(['polynomial', 'additive']);
export type HashVariant = z.infer<typeof hashVariantSchema>;

/**
 * @notice How per-bucket collisions are aggregated into an energy value
 * @dev `average` divides the collision sum by the number of occupied buckets
 */
export const energyModeSchema = z.enum(['sum', 'average']);
export type EnergyMode = z.infer<typeof energyModeSchema>;

/**
 * @notice Schema for a hash table size, a power of two between 2 and 2^31
 */
export const tableSizeSchema = z
  .number()
  .int()
  .min(2)
  .max(HASH_CONSTANTS.MAX_TABLE_SIZE)
  .refine(size => (size & (size - 1)) === 0, {
    message: 'Table size must be a power of two',
  });

/**
 * @notice Schema for the configuration of one annealing run
 */
export const annealingConfigSchema = z.object({
  size: tableSizeSchema,
  kmax: z.number().int().nonnegative(),
  emax: z.number().finite().nonnegative(),
  initialState: shiftStateSchema,
  energyMode: energyModeSchema,
});
export type AnnealingConfig = z.infer<typeof annealingConfigSchema>;

/**
 * @notice Diagnostics handed to the iteration observer, once per iteration
 */
export type IterationSnapshot = {
  k: number;
  temperature: number;
  proposedState: ShiftState;
  proposedEnergy: number;
  currentEnergy: number;
  bestEnergy: number;
  accepted: boolean;
  isNewBest: boolean;
};

export type IterationObserver = (snapshot: IterationSnapshot) => void;

/**
 * @notice Outcome of one table size in an experiment
 */
export type SizeComparison = {
  size: number;
  bestState: ShiftState;
  bestEnergy: number;
  referenceState: ShiftState;
  referenceEnergy: number;
  improved: boolean;
};

export type RunLog = {
  words: number;
  hashVariant: HashVariant;
  energyMode: EnergyMode;
  size: number;
  mask: string;
  seed: number;
  kmax: number;
  emax: number;
  initial: {
    state: string;
    energy: number;
  };
  best: {
    state: string;
    energy: number;
  };
  reference: {
    state: string;
    energy: number;
  };
  improved: boolean;
};
