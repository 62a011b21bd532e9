import { access, readdir, rmdir } from 'node:fs/promises';
import { dirname, relative, isAbsolute, resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { errorCode } from './errors.js';

const PERMISSION_ERROR_CODES = new Set(['EACCES', 'EPERM', 'EBUSY']);
const CASE_INSENSITIVE_PLATFORM = process.platform === 'win32' || process.platform === 'darwin';

export interface RetryPolicy {
  delayMs: number;
  maxAttempts: number;
}

export const PERMISSION_RETRY: RetryPolicy = {
  delayMs: 1000,
  maxAttempts: Number.POSITIVE_INFINITY,
};

export function isPermissionError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== null && PERMISSION_ERROR_CODES.has(code);
}

/**
 * Runs `operation` until it stops failing with a permission error. Other
 * errors, and the last permission error once `maxAttempts` is reached, are
 * rethrown. `onRetry` is called before each sleep.
 */
export async function retryOnPermissionError<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  onRetry: (error: unknown, attempt: number) => void
): Promise<T> {
  let attempt = 1;

  while (true) {
    try {
      return await operation();
    } catch (error) {
      if (!isPermissionError(error) || attempt >= policy.maxAttempts) {
        throw error;
      }

      onRetry(error, attempt);
      await sleep(policy.delayMs);
      attempt++;
    }
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function normcase(path: string): string {
  const resolved = resolve(path);
  return CASE_INSENSITIVE_PLATFORM ? resolved.toLowerCase() : resolved;
}

export function samePath(a: string, b: string): boolean {
  return normcase(a) === normcase(b);
}

export function isInside(path: string, root: string): boolean {
  const rel = relative(root, path);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

/**
 * Removes `start` and its ancestors while they are empty, never touching
 * `stopAt` or anything outside it.
 */
export async function removeEmptyParents(start: string, stopAt: string): Promise<string[]> {
  const removed: string[] = [];
  let current = resolve(start);

  while (isInside(current, stopAt)) {
    const entries = await readdir(current);

    if (entries.length > 0) {
      break;
    }

    await rmdir(current);
    removed.push(current);
    current = dirname(current);
  }

  return removed;
}
