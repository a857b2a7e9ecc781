import ANNEALING_CONSTANTS from '@/constants/annealingConstants';
import {
  parseEnergyMode,
  parseEnvVar,
  parseFlag,
  parseHashVariant,
  parseInteger,
  parseNonNegativeNumber,
  parseShiftState,
  parseTableSizes,
} from '@/utils/common/parser';
import dotenv from 'dotenv';

dotenv.config();

/**
 * @notice Exported environment variables object
 * @dev These values are parsed once when the module is first imported
 * and remain constant afterwards due to Node.js module caching
 */
const ENV = {
  /** @notice Path of the whitespace-delimited word list */
  WORDS_PATH: parseEnvVar(process.env.WORDS_PATH, 'WORDS_PATH'),
  /** @notice Path where the base hash codes are cached, one per line */
  HASHED_PATH: process.env.HASHED_PATH || 'hashed',
  /** @notice Base hash variant, "polynomial" or "additive" */
  HASH_VARIANT: parseHashVariant(process.env.HASH_VARIANT),
  /** @notice Energy aggregation, "sum" of collisions or "average" per occupied bucket */
  ENERGY_MODE: parseEnergyMode(process.env.ENERGY_MODE),
  /** @notice Comma-separated power-of-two table sizes, one annealing run each */
  TABLE_SIZES: parseTableSizes(process.env.TABLE_SIZES),
  /** @notice Iteration budget of each run */
  KMAX: parseInteger(process.env.KMAX, ANNEALING_CONSTANTS.KMAX, 'KMAX'),
  /** @notice Energy floor, a run stops once its current energy is at or below it */
  EMAX: parseNonNegativeNumber(process.env.EMAX, ANNEALING_CONSTANTS.EMAX, 'EMAX'),
  /** @notice Seed state as `a:b:c:d`, defaults to the reference shifts */
  INITIAL_STATE: parseShiftState(process.env.INITIAL_STATE),
  /** @notice Optional. Seed of the random source, the wall clock is used when unset */
  SEED: process.env.SEED ? parseInteger(process.env.SEED, 0, 'SEED') : undefined,
  /** @notice If "true", every iteration is logged at debug level */
  VERBOSE: parseFlag(process.env.VERBOSE),
};

export default ENV;
