import * as fs from 'fs';
import type { PathKind } from '../../shared/types.js';

/**
 * Classify a path once per session. A link to a directory counts as a
 * directory; a link to anything else is reported as a symlink and read
 * through like a regular file. Dangling links are missing.
 */
export function classifyPath(targetPath: string): PathKind {
  if (!fs.existsSync(targetPath)) {
    return 'missing';
  }
  if (fs.statSync(targetPath).isDirectory()) {
    return 'directory';
  }
  if (fs.lstatSync(targetPath).isSymbolicLink()) {
    return 'symlink';
  }
  return 'file';
}
