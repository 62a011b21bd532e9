import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CatalogRelease } from './types.js';

export interface CacheEntry {
  value: CatalogRelease | null;
  storedAt: number;
}

export interface Cache {
  entries: Record<string, CacheEntry>;
}

function createEmptyCache(): Cache {
  return { entries: {} };
}

function isCache(value: unknown): value is Cache {
  return typeof value === 'object'
    && value !== null
    && 'entries' in value
    && typeof value.entries === 'object'
    && value.entries !== null;
}

export async function loadCache(cacheFile: string): Promise<Cache> {
  try {
    const data = await readFile(cacheFile, 'utf-8');
    const parsed: unknown = JSON.parse(data);
    return isCache(parsed) ? parsed : createEmptyCache();
  } catch {
    return createEmptyCache();
  }
}

export async function saveCache(cacheFile: string, cache: Cache): Promise<void> {
  await mkdir(dirname(cacheFile), { recursive: true });
  await writeFile(cacheFile, JSON.stringify(cache, null, 2));
}

export function normalizeKey(...parts: string[]): string {
  return parts
    .map((part) => part
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim())
    .join('|');
}

/** Undefined when there is no entry or it is older than `ttlMs`. */
export function getCachedEntry(
  cache: Cache,
  key: string,
  ttlMs: number,
  now: number = Date.now()
): CacheEntry | undefined {
  const entry = cache.entries[key];

  if (!entry || now - entry.storedAt > ttlMs) {
    return undefined;
  }

  return entry;
}

export function setCacheEntry(
  cache: Cache,
  key: string,
  value: CatalogRelease | null,
  now: number = Date.now()
): void {
  cache.entries[key] = { value, storedAt: now };
}
