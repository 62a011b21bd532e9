import chalk from 'chalk';
import { describeError } from './errors.js';
import { getCachedEntry, loadCache, normalizeKey, saveCache, setCacheEntry, type Cache } from './cache.js';
import type { CatalogRelease, ReferenceCatalog } from './types.js';

export interface CatalogOptions {
  apiUrl: string;
  cacheFile: string;
  ttlSeconds: number;
}

function isCatalogRelease(value: unknown): value is { artist: string; title: string; year?: unknown } {
  return typeof value === 'object'
    && value !== null
    && 'artist' in value
    && typeof value.artist === 'string'
    && 'title' in value
    && typeof value.title === 'string';
}

function toCatalogRelease(value: unknown): CatalogRelease | null {
  if (!isCatalogRelease(value)) {
    return null;
  }

  const year = typeof value.year === 'string' || typeof value.year === 'number' ? String(value.year) : null;

  return { artist: value.artist, title: value.title, year };
}

async function fetchRelease(apiUrl: string, artist: string, title: string): Promise<CatalogRelease | null> {
  const url = new URL('release', apiUrl.endsWith('/') ? apiUrl : `${apiUrl}/`);
  url.searchParams.set('artist', artist);
  url.searchParams.set('title', title);

  const response = await fetch(url, { headers: { Accept: 'application/json' } });

  if (response.status === 404) {
    return null;
  }

  if (!response.ok) {
    throw new Error(`Catalog lookup failed with status ${response.status}`);
  }

  return toCatalogRelease(await response.json());
}

/**
 * Reference catalog backed by an HTTP API. Hits and misses are cached on
 * disk for `ttlSeconds`; failed requests are not cached.
 */
export function createReferenceCatalog(options: CatalogOptions): ReferenceCatalog {
  let cache: Cache | null = null;
  const ttlMs = options.ttlSeconds * 1000;

  return {
    async lookupRelease(artist, title) {
      const store = cache ?? (await loadCache(options.cacheFile));
      cache = store;
      const key = normalizeKey(artist, title);
      const cached = getCachedEntry(store, key, ttlMs);

      if (cached) {
        return cached.value;
      }

      let release: CatalogRelease | null;

      try {
        release = await fetchRelease(options.apiUrl, artist, title);
      } catch (error) {
        console.error(chalk.yellow(`Catalog lookup failed for ${artist} - ${title}: ${describeError(error)}`));
        return null;
      }

      setCacheEntry(store, key, release);
      await saveCache(options.cacheFile, store);

      return release;
    },
  };
}
