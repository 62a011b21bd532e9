import { open } from 'node:fs/promises';
import { join } from 'node:path';
import { isPermissionError } from './fs-utils.js';
import { listFiles } from './scanner.js';

/**
 * Opens every file under `dir` for reading and writing without touching its
 * contents. False as soon as one file is locked or not writable.
 */
export async function canLockPath(dir: string): Promise<boolean> {
  for (const file of await listFiles(dir)) {
    try {
      const handle = await open(join(dir, file), 'r+');
      await handle.close();
    } catch (error) {
      if (isPermissionError(error)) {
        return false;
      }

      throw error;
    }
  }

  return true;
}
