import { mkdir, rename } from 'node:fs/promises';
import { basename, join } from 'node:path';
import chalk from 'chalk';
import { pathExists } from './fs-utils.js';
import {
  codecRank,
  releaseArtists,
  releaseCodecFamily,
  releaseTitle,
  releaseYear,
} from './release.js';
import type { Release } from './types.js';

export interface UniqueRelease {
  artists: string[];
  year: string;
  title: string;
  codec: string;
  rank: number;
  path: string;
}

/** Occupant of each fingerprint seen during one run. */
export interface DuplicateContext {
  readonly occupants: ReadonlyMap<string, UniqueRelease>;
}

export interface Resolution {
  context: DuplicateContext;
  path: string;
  demoted: string | null;
}

export function createDuplicateContext(): DuplicateContext {
  return { occupants: new Map() };
}

function normalizeString(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function fingerprintKey(release: UniqueRelease): string {
  return JSON.stringify([
    release.artists.map(normalizeString),
    release.year,
    normalizeString(release.title),
    release.codec.toLowerCase(),
  ]);
}

export function toUniqueRelease(release: Release, path: string): UniqueRelease {
  return {
    artists: releaseArtists(release),
    year: releaseYear(release),
    title: releaseTitle(release),
    codec: releaseCodecFamily(release),
    rank: codecRank(release),
    path,
  };
}

export function outranks(a: UniqueRelease, b: UniqueRelease): boolean {
  return a.rank > b.rank;
}

/**
 * Moves `source` to `duplicateRoot/folderName`, or the first free
 * `folderName_N` when that is taken.
 */
export async function moveToDuplicateRoot(
  duplicateRoot: string,
  source: string,
  folderName: string
): Promise<string> {
  await mkdir(duplicateRoot, { recursive: true });

  for (let attempt = 0; ; attempt++) {
    const destination = join(duplicateRoot, attempt ? `${folderName}_${attempt}` : folderName);

    if (await pathExists(destination)) {
      continue;
    }

    await rename(source, destination);
    console.log(chalk.yellow(`Moved duplicate to ${destination}`));

    return destination;
  }
}

/**
 * Records `candidate` as the occupant of its fingerprint. When another copy
 * already holds it, the lower-ranked of the two goes to `duplicateRoot`; the
 * newcomer loses ties. A demoted newcomer is filed under `folderName`, its
 * canonical folder name, and a demoted occupant under its current name.
 */
export async function resolveDuplicate(
  context: DuplicateContext,
  candidate: UniqueRelease,
  duplicateRoot: string,
  folderName: string
): Promise<Resolution> {
  const key = fingerprintKey(candidate);
  const existing = context.occupants.get(key);
  const occupants = new Map(context.occupants);

  if (!existing) {
    occupants.set(key, candidate);
    return { context: { occupants }, path: candidate.path, demoted: null };
  }

  if (outranks(candidate, existing)) {
    const demoted = await moveToDuplicateRoot(duplicateRoot, existing.path, basename(existing.path));
    occupants.set(key, candidate);

    return { context: { occupants }, path: candidate.path, demoted };
  }

  const demoted = await moveToDuplicateRoot(duplicateRoot, candidate.path, folderName);

  return { context, path: demoted, demoted };
}
