import ANNEALING_CONSTANTS from '@/constants/annealingConstants';
import HASH_CONSTANTS from '@/constants/hashConstants';
import {
  type AnnealingConfig,
  type IterationObserver,
  type ShiftField,
  type ShiftState,
} from '@/types/types';
import { validateAnnealingConfig } from '@/utils/common/parser';
import { randomInt, type RandomSource } from '@/utils/common/random';
import { computeEnergy } from '@/utils/hashing/computeEnergy';

const SHIFT_FIELDS: readonly ShiftField[] = ['a', 'b', 'c', 'd'];

/**
 * @notice Temperature for iteration k of a kmax budget, 100 / (k / kmax)
 * @dev k = 0 would divide by zero and is treated as infinitely hot
 */
export function computeTemperature(k: number, kmax: number) {
  if (k === 0) return ANNEALING_CONSTANTS.INITIAL_TEMP;
  return ANNEALING_CONSTANTS.TEMP_SCALE / (k / kmax);
}

/**
 * @notice Probability of moving from energy e to enew at temperature T
 * @returns 1 for an improvement, exp(-(enew - e) / T) otherwise
 */
export function computeAcceptProbability(e: number, enew: number, temperature: number) {
  if (enew < e) return 1;
  return Math.exp(-(enew - e) / temperature);
}

const clampShift = (value: number) =>
  Math.min(HASH_CONSTANTS.MAX_SHIFT, Math.max(HASH_CONSTANTS.MIN_SHIFT, value));

/**
 * @notice Generates a neighbouring state by nudging one random shift amount
 * @dev Draws field, direction and magnitude (1..MAX_STEP) in that order, then clamps into
 * [MIN_SHIFT, MAX_SHIFT]. The input state is left untouched.
 */
export function generateNeighbor(state: ShiftState, random: RandomSource): ShiftState {
  const field = SHIFT_FIELDS[randomInt(random, SHIFT_FIELDS.length)];
  const direction = random() < 0.5 ? -1 : 1;
  const magnitude = 1 + randomInt(random, ANNEALING_CONSTANTS.MAX_STEP);

  return { ...state, [field]: clampShift(state[field] + direction * magnitude) };
}

/**
 * @notice Main simulated annealing search over shift states
 * @dev Stops after kmax iterations or once the current energy is at or below emax.
 * The best state tracks every proposed neighbour, accepted or not.
 * @returns Tuple of [best state found, its energy]
 */
export function computeSimAnnealing({
  baseHashes,
  config,
  random,
  onIteration,
  shouldStop,
}: {
  baseHashes: readonly number[];
  config: AnnealingConfig;
  random: RandomSource;
  onIteration?: IterationObserver;
  shouldStop?: () => boolean;
}) {
  const { size, kmax, emax, initialState, energyMode } = validateAnnealingConfig(config);
  const energy = (state: ShiftState) => computeEnergy(baseHashes, state, size, energyMode);

  let currentState: ShiftState = initialState;
  let currentEnergy = energy(initialState);

  let bestState = currentState;
  let bestEnergy = currentEnergy;

  let k = 0;
  while (k < kmax && currentEnergy > emax && !shouldStop?.()) {
    const temperature = computeTemperature(k, kmax);
    const newState = generateNeighbor(currentState, random);
    const newEnergy = energy(newState);

    const accepted = computeAcceptProbability(currentEnergy, newEnergy, temperature) > random();
    if (accepted) {
      currentState = newState;
      currentEnergy = newEnergy;
    }

    const isNewBest = newEnergy < bestEnergy;
    if (isNewBest) {
      bestState = newState;
      bestEnergy = newEnergy;
    }

    onIteration?.({
      k,
      temperature,
      proposedState: newState,
      proposedEnergy: newEnergy,
      currentEnergy,
      bestEnergy,
      accepted,
      isNewBest,
    });

    k++;
  }

  return [bestState, bestEnergy] as const;
}
