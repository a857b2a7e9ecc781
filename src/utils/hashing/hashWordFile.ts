import { type HashVariant } from '@/types/types';
import { InputUnavailableError } from '@/utils/common/errors';
import { logger } from '@/utils/common/log';
import { readWordList } from '@/utils/common/readWordList';
import { computeBaseHashes } from '@/utils/hashing/computeBaseHash';
import { readFile, writeFile } from 'node:fs/promises';

/**
 * @notice Hashes a word file and writes the codes to the hashed cache, one per line
 * @returns The base hash codes, in word order
 */
export async function hashWordFile(wordsPath: string, hashedPath: string, variant: HashVariant) {
  const words = await readWordList(wordsPath);
  const codes = computeBaseHashes(words, variant);

  try {
    await writeFile(hashedPath, codes.map(code => `${code}\n`).join(''), 'utf-8');
  } catch (error) {
    throw new InputUnavailableError(hashedPath, { cause: error });
  }

  logger.info({ msg: 'hashed word list', wordsPath, hashedPath, variant, words: words.length });
  return codes;
}

/**
 * @notice Parses the hashed cache back into codes
 * @returns Codes in file order, or undefined if the file cannot be read
 */
export async function readHashedCodes(hashedPath: string) {
  let raw: string;
  try {
    raw = await readFile(hashedPath, 'utf-8');
  } catch (error) {
    logger.warn({ msg: 'Unable to read hashed codes', hashedPath, error });
    return undefined;
  }

  return raw
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => {
      const code = Number(line);
      if (!Number.isInteger(code) || code < 0 || code > 0xffffffff) {
        throw new InputUnavailableError(hashedPath, {
          cause: new Error(`Malformed hash code "${line}"`),
        });
      }
      return code;
    });
}
