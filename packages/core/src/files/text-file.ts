import { readFile } from 'node:fs/promises';

import { RefmtError } from '../errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a file as UTF-8 text. Invalid byte sequences are an error rather than
 * being replaced, so a binary file is never rewritten.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const bytes = await readFile(filePath);
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new RefmtError('File is not valid UTF-8 text', { cause: error });
  }
}
