import { mkdir, rename } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import chalk from 'chalk';
import { pathExists } from './fs-utils.js';

const DISC_MARKER_PATTERN = /( )?([(\[{ ])?(disc|disk|cd|part)( ?)(\d{1,2})([)\]}])?/i;
const TRAILING_TAG_PATTERN = / \[\w+\]/g;
const ALPHANUMERIC = /[\p{L}\p{N}]/u;

export interface DiscGroup {
  container: string;
  discs: string[];
}

/**
 * Folder name of the release a disc folder belongs to, or null when the
 * name carries no standalone disc marker.
 */
export function discContainerName(folder: string): string | null {
  const match = DISC_MARKER_PATTERN.exec(folder);

  if (!match) {
    return null;
  }

  const wordIndex = match.index + (match[1] ?? '').length + (match[2] ?? '').length;

  if (wordIndex > 0 && ALPHANUMERIC.test(folder[wordIndex - 1])) {
    return null;
  }

  const container = folder.replace(match[0], '').replace(TRAILING_TAG_PATTERN, '');

  return container.trim() ? container : null;
}

/** Sibling disc folders sharing a container, keyed case-insensitively; lone discs are dropped. */
export function findDiscGroups(releaseDirs: string[]): DiscGroup[] {
  const groups = new Map<string, { container: string; discs: Set<string> }>();

  for (const dir of releaseDirs) {
    const containerName = discContainerName(basename(dir));

    if (containerName === null) {
      continue;
    }

    const container = join(dirname(dir), containerName);
    const key = container.toLowerCase();
    const group = groups.get(key);

    if (group) {
      group.discs.add(dir);
    } else {
      groups.set(key, { container, discs: new Set([dir]) });
    }
  }

  return [...groups.values()]
    .filter((group) => group.discs.size > 1)
    .map((group) => ({ container: group.container, discs: [...group.discs] }));
}

/**
 * Gathers sibling disc folders of one release under a shared container.
 * With `apply` the folders are moved and the working list gets the
 * container in place of the discs; without it the discs are only dropped
 * from the list.
 */
export async function assembleDiscs(releaseDirs: string[], apply: boolean): Promise<string[]> {
  const groups = findDiscGroups(releaseDirs);
  const containerFor = new Map<string, string>();

  for (const group of groups) {
    if (apply) {
      await mkdir(group.container, { recursive: true });
    }

    for (const disc of group.discs) {
      if (!apply) {
        containerFor.set(disc, '');
        continue;
      }

      const target = join(group.container, basename(disc));

      if (await pathExists(target)) {
        console.error(chalk.red(`Disc folder already exists, not moving: ${target}`));
        continue;
      }

      await rename(disc, target);
      containerFor.set(disc, group.container);
    }
  }

  const result: string[] = [];
  const emitted = new Set<string>();

  for (const dir of releaseDirs) {
    const container = containerFor.get(dir);

    if (container === undefined) {
      if (!emitted.has(dir)) {
        result.push(dir);
        emitted.add(dir);
      }

      continue;
    }

    if (container && !emitted.has(container)) {
      result.push(container);
      emitted.add(container);
    }
  }

  return result;
}
