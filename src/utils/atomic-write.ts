import { renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from './errors.js';

/**
 * Write `contents` to `target` through a sibling temp file and an atomic rename.
 * On failure the temp file is removed and the error rethrown.
 */
export function writeFileAtomic(target: string, contents: string, dir: string): void {
  const tmp = join(dir, `.${uuidv4()}.tmp`);
  try {
    writeFileSync(tmp, contents);
    renameSync(tmp, target);
  } catch (err) {
    try {
      rmSync(tmp, { force: true });
    } catch (cleanupErr) {
      console.warn(`[State] Could not remove temp file ${tmp}:`, errorMessage(cleanupErr));
    }
    throw err;
  }
}
