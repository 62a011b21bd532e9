import { readdir, rename } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import { PathTooLongError } from './errors.js';
import { pathExists } from './fs-utils.js';

export const MAX_PATH_LENGTH = 255;
export const MAX_PARENT_LENGTH = 245;

const ELLIPSIS = '..';
const EXTENSION_PATTERN = /^\.[A-Za-z0-9]{1,5}$/;

function extensionOf(fullPath: string): string {
  const extension = extname(fullPath);
  return EXTENSION_PATTERN.test(extension) ? extension : '';
}

/** Truncated form of `fullPath`, or null when it already fits. */
export function shortenPath(fullPath: string): string | null {
  if (fullPath.length <= MAX_PATH_LENGTH) {
    return null;
  }

  if (dirname(fullPath).length >= MAX_PARENT_LENGTH) {
    throw new PathTooLongError(dirname(fullPath));
  }

  const extension = extensionOf(fullPath);
  const prefix = fullPath.slice(0, fullPath.length - extension.length);

  return prefix.slice(0, MAX_PATH_LENGTH - extension.length - ELLIPSIS.length) + ELLIPSIS + extension;
}

/**
 * Renames entries of `dir` whose full path exceeds the limit. An entry whose
 * shortened name is taken keeps its long name.
 */
export async function enforceMaxPath(dir: string): Promise<void> {
  for (const name of await readdir(dir)) {
    const fullPath = join(dir, name);
    const shortened = shortenPath(fullPath);

    if (shortened === null || (await pathExists(shortened))) {
      continue;
    }

    await rename(fullPath, shortened);
  }
}
