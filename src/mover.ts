import { mkdir, rename } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import chalk from 'chalk';
import { moveToDuplicateRoot } from './duplicates.js';
import { describeError } from './errors.js';
import {
  pathExists,
  removeEmptyParents,
  retryOnPermissionError,
  samePath,
  type RetryPolicy,
} from './fs-utils.js';
import {
  canValidateFolderName,
  flattenArtists,
  getFolderName,
  getTrackFilename,
  isVariousArtists,
  releaseArtists,
  sanitizeName,
} from './release.js';
import type { Release, Track, Violation, ViolationType } from './types.js';

export interface PlacementOptions {
  dryRun: boolean;
  groupByArtist: boolean;
  groupByCategory: boolean;
  fullCodecNames: boolean;
  destRoot: string | null;
  duplicateRoot: string | null;
  moveOnlyValid: boolean;
  scanRoot: string;
  retry: RetryPolicy;
}

export interface Placement {
  path: string;
  movedDuplicate: boolean;
}

async function renameWithRetry(source: string, destination: string, policy: RetryPolicy): Promise<void> {
  await retryOnPermissionError(
    () => rename(source, destination),
    policy,
    (error) => {
      console.error(
        chalk.red(`Could not rename '${source}' -> '${destination}', retrying: ${describeError(error)}`)
      );
    }
  );
}

/** True when `destination` is free, or is `source` itself under another letter case. */
async function canRenameTo(source: string, destination: string): Promise<boolean> {
  if (source.toLowerCase() === destination.toLowerCase()) {
    return true;
  }

  return !(await pathExists(destination));
}

export function destinationFolder(release: Release, destRoot: string, options: PlacementOptions): string {
  const artistFolder = options.groupByArtist && !isVariousArtists(release)
    ? sanitizeName(flattenArtists(releaseArtists(release)))
    : '';
  const categoryFolder = options.groupByCategory ? release.category : '';

  return join(destRoot, categoryFolder, artistFolder);
}

/**
 * Renames a release folder to its canonical name, then moves it under the
 * destination root when one is set. A taken destination sends the release
 * to the duplicate root when there is one and otherwise leaves it in place.
 */
export async function placeRelease(
  release: Release,
  currentPath: string,
  options: PlacementOptions
): Promise<Placement> {
  if (options.dryRun || !canValidateFolderName(release)) {
    return { path: currentPath, movedDuplicate: false };
  }

  const folderName = getFolderName(release, {
    codecShort: !options.fullCodecNames,
    groupByCategory: options.groupByCategory,
  });

  let movedPath = currentPath;
  const renamedPath = join(dirname(currentPath), folderName);

  if (currentPath !== renamedPath) {
    if (await canRenameTo(currentPath, renamedPath)) {
      await renameWithRetry(currentPath, renamedPath, options.retry);
      movedPath = renamedPath;
    } else {
      console.error(chalk.red(`Release folder already exists: ${renamedPath}`));
    }
  }

  const moveAllowed = release.numViolations === 0 || !options.moveOnlyValid;

  if (!options.destRoot || !moveAllowed) {
    return { path: movedPath, movedDuplicate: false };
  }

  const parent = destinationFolder(release, options.destRoot, options);
  const destination = join(parent, folderName);

  if (samePath(movedPath, destination)) {
    return { path: movedPath, movedDuplicate: false };
  }

  await mkdir(parent, { recursive: true });

  if (!(await pathExists(destination))) {
    await renameWithRetry(movedPath, destination, options.retry);
    await removeEmptyParents(dirname(movedPath), options.scanRoot);

    return { path: destination, movedDuplicate: false };
  }

  if (options.duplicateRoot) {
    const duplicatePath = await moveToDuplicateRoot(options.duplicateRoot, movedPath, folderName);
    await removeEmptyParents(dirname(movedPath), options.scanRoot);

    return { path: duplicatePath, movedDuplicate: true };
  }

  console.error(chalk.red(`Destination folder already exists: ${destination}`));

  return { path: movedPath, movedDuplicate: false };
}

/**
 * Moves a release that fails `kind` into `invalidRoot`, unless a folder of
 * the same name is already there.
 */
export async function moveInvalidFolder(
  currentPath: string,
  invalidRoot: string | null,
  violations: Violation[],
  kind: ViolationType | null,
  dryRun: boolean
): Promise<string> {
  if (!invalidRoot || !kind || dryRun) {
    return currentPath;
  }

  if (!violations.some((violation) => violation.type === kind)) {
    return currentPath;
  }

  const destination = join(invalidRoot, basename(currentPath));

  if (await pathExists(destination)) {
    console.error(chalk.red(`Invalid release folder already exists: ${destination}`));
    return currentPath;
  }

  await rename(currentPath, destination);

  return destination;
}

/**
 * Renames track files to their canonical names and returns the release
 * keyed by the new names. Nothing is renamed when any track lacks a
 * canonical name.
 */
export async function renameTrackFiles(
  release: Release,
  releaseDir: string,
  dryRun: boolean,
  retry: RetryPolicy
): Promise<Release> {
  const variousArtists = isVariousArtists(release);
  const renames: Array<[string, string]> = [];

  for (const [filename, track] of release.tracks) {
    const canonical = getTrackFilename(track, filename, variousArtists);

    if (canonical === null) {
      return release;
    }

    if (filename !== canonical) {
      renames.push([filename, canonical]);
    }
  }

  const renamed = new Map<string, string>();

  for (const [from, to] of renames) {
    const source = join(releaseDir, from);
    const destination = join(releaseDir, to);

    if (!(await canRenameTo(source, destination))) {
      console.error(chalk.red(`File already exists, could not rename: ${destination}`));
      continue;
    }

    if (!dryRun) {
      await renameWithRetry(source, destination, retry);
    }

    renamed.set(from, to);
  }

  if (renamed.size === 0) {
    return release;
  }

  const tracks = new Map<string, Track>();

  for (const [filename, track] of release.tracks) {
    tracks.set(renamed.get(filename) ?? filename, track);
  }

  return { ...release, tracks };
}
