/**
 * @notice Constants of the hashing and bucketing pipeline
 */
const HASH_CONSTANTS = {
  /** @notice Multiplier of the polynomial base hash */
  POLYNOMIAL_MULTIPLIER: 31,
  /** @notice Smallest shift amount */
  MIN_SHIFT: 0,
  /** @notice Largest shift amount, still inside a 32-bit word */
  MAX_SHIFT: 31,
  /** @notice Largest table size whose mask fits an unsigned 32-bit value */
  MAX_TABLE_SIZE: 2 ** 31,
  /** @notice Table size used when none is configured */
  DEFAULT_TABLE_SIZE: 1048576,
  /** @notice Shift amounts of the original spreading scheme, used as the baseline */
  REFERENCE_STATE: { a: 20, b: 12, c: 7, d: 4 },
  /** @notice Energy reported when the hashed-codes file cannot be read */
  ENERGY_UNAVAILABLE: -1,
} as const;

export default HASH_CONSTANTS;
