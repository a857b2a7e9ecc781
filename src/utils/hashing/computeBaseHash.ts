import HASH_CONSTANTS from '@/constants/hashConstants';
import { type HashVariant } from '@/types/types';

/**
 * @notice Polynomial string hash, s[0]*31^(n-1) + ... + s[n-1] in unsigned 32-bit arithmetic
 * @dev The empty string hashes to 0
 */
export function computeBaseHash(word: string) {
  let h = 0;
  for (let i = 0; i < word.length; i++) {
    h = (Math.imul(HASH_CONSTANTS.POLYNOMIAL_MULTIPLIER, h) + word.charCodeAt(i)) >>> 0;
  }
  return h;
}

/**
 * @notice Additive string hash, the sum of character codes
 * @dev Anagrams always collide, which makes it a poor landscape to search
 */
export function computeBadHash(word: string) {
  let h = 0;
  for (let i = 0; i < word.length; i++) {
    h = (h + word.charCodeAt(i)) >>> 0;
  }
  return h;
}

const HASHERS: Record<HashVariant, (word: string) => number> = {
  polynomial: computeBaseHash,
  additive: computeBadHash,
};

/**
 * @notice Hashes every word with the selected variant
 * @returns Base hash codes in word order
 */
export function computeBaseHashes(words: readonly string[], variant: HashVariant = 'polynomial') {
  const hasher = HASHERS[variant];
  return words.map(word => hasher(word));
}
