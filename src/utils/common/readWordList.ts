import { InputUnavailableError } from '@/utils/common/errors';
import { readFile } from 'node:fs/promises';

/**
 * @notice Splits text into whitespace-delimited tokens
 */
export function tokenizeWords(text: string) {
  return text.split(/\s+/).filter(word => word.length > 0);
}

/**
 * @notice Reads a whitespace-delimited word list
 * @throws InputUnavailableError if the file cannot be read
 */
export async function readWordList(path: string) {
  try {
    const raw = await readFile(path, 'utf-8');
    return tokenizeWords(raw);
  } catch (error) {
    throw new InputUnavailableError(path, { cause: error });
  }
}
