/**
 * @notice Constants used in the simulated annealing search
 * @dev These parameters control the temperature schedule and the neighbour moves
 */
const ANNEALING_CONSTANTS = {
  /** @notice Scale of the temperature schedule, T = TEMP_SCALE / (k / kmax) */
  TEMP_SCALE: 100,
  /** @notice Temperature substituted at k = 0, where the schedule divides by zero */
  INITIAL_TEMP: Number.POSITIVE_INFINITY,
  /** @notice Largest magnitude of a single neighbour move */
  MAX_STEP: 6,
  /** @notice Default iteration budget */
  KMAX: 5000,
  /** @notice Default energy floor, the search stops once the current energy reaches it */
  EMAX: 0,
};

export default ANNEALING_CONSTANTS;
