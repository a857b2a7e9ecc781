/**
 * @notice Random source returning a float in [0, 1)
 */
export type RandomSource = () => number;

/**
 * @notice Creates a deterministic xorshift32 generator from a seed
 * @dev A zero state would stay zero forever, so it is replaced by 1
 * @param seed Integer seed, reduced to unsigned 32 bits
 * @returns Random source function returning [0, 1)
 */
export function createRandomSource(seed: number): RandomSource {
  let state = Math.floor(seed) >>> 0 || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * @notice Picks the seed for a run, falling back to the wall clock
 */
export function resolveSeed(seed?: number) {
  return seed ?? Date.now() >>> 0;
}

/**
 * @notice Draws an integer uniformly from [0, n)
 */
export function randomInt(random: RandomSource, n: number) {
  return Math.floor(random() * n);
}
