/**
 * @module atomic-write
 * Replaces a file in one step: the data goes to a temp file in the same
 * directory, which is then renamed over the target.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProjectFileError, generateId } from '@reversible/core';

/** Temp file name used while writing `filePath`. */
export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  return path.join(dir, `.${path.basename(filePath)}.${generateId()}.tmp`);
}

/**
 * Write `data` to `filePath` atomically. On failure the temp file is removed
 * and the previous contents of `filePath`, if any, are left untouched.
 *
 * @throws ProjectFileError wrapping the underlying fs error.
 */
export function writeFileAtomic(filePath: string, data: Uint8Array): void {
  const tempPath = tempPathFor(filePath);
  try {
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw new ProjectFileError(`Could not write ${filePath}`, { cause: error });
  }
}
