// corrector/data/custom-dictionary - The user's own word list, one word per line

import fs from 'fs';
import path from 'path';
import { CustomDictionaryError } from './errors.js';

export const CUSTOM_DICTIONARY_FILE = 'custom.txt';

/** Append `word` as a new line, creating the file and its directory when missing. */
export function appendCustomWord(filePath: string, word: string): void {
  const trimmed = word.trim();
  if (trimmed === '' || /[\r\n]/.test(trimmed)) {
    throw new CustomDictionaryError(filePath, `invalid word '${word}'`);
  }

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, `${trimmed}\n`, 'utf-8');
  } catch (error) {
    throw new CustomDictionaryError(filePath, error);
  }
}
