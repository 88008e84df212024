import * as fs from 'fs';
import { FileViewerError, describeError } from './errors.js';

export const DIRECTORY_ENCODING = 'utf-8';

/**
 * Sorted names of the immediate children of a directory, one per line,
 * as UTF-8 bytes. This is the pseudo-content a directory session shows.
 */
export async function readDirectoryContent(dirPath: string): Promise<Buffer> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dirPath);
  } catch (err) {
    throw new FileViewerError('DIRECTORY_READ_ERROR', `Failed to load directory: ${describeError(err)}`, {
      cause: err,
    });
  }

  names.sort();
  return Buffer.from(names.join('\n'), DIRECTORY_ENCODING);
}
