import { readdir } from 'node:fs/promises';
import { basename, sep } from 'node:path';
import { RELEASE_CATEGORIES, RELEASE_SOURCES } from './types.js';
import type { ReleaseCategory, ReleaseSource } from './types.js';

const BRACKET_PAIRS: Array<[string, string]> = [['[', ']'], ['(', ')'], ['{', '}']];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Up to three ancestors, nearest first. The release folder itself is never one. */
function parentDirs(path: string): string[] {
  const parts = path.split(sep).filter(Boolean);
  return parts.slice(Math.max(0, parts.length - 4), -1).reverse();
}

/**
 * Matches `name` against a vocabulary in order of precedence: a bracketed
 * tag in the folder name, an ancestor named exactly after a term, a trailing
 * or space-surrounded word, and a word delimited by separators.
 */
function guessFromPath<T extends string>(
  path: string,
  vocabulary: readonly T[],
  wordVocabulary: readonly T[],
  delimitedVocabulary: readonly T[]
): T | null {
  const folder = basename(path).toLowerCase();

  for (const term of vocabulary) {
    for (const [open, close] of BRACKET_PAIRS) {
      if (folder.includes(`${open}${term.toLowerCase()}${close}`)) {
        return term;
      }
    }
  }

  const parents = parentDirs(path);

  for (const term of vocabulary) {
    if (parents.some((dir) => dir.toLowerCase() === term.toLowerCase())) {
      return term;
    }
  }

  for (const term of wordVocabulary) {
    const word = term.toLowerCase();

    if (folder.endsWith(` ${word}`) || folder.includes(` ${word} `)) {
      return term;
    }
  }

  for (const term of delimitedVocabulary) {
    const pattern = new RegExp(`[-_\\[{( ]${escapeRegExp(term)}(?:[-_\\]}) ]|$)`, 'i');

    if (pattern.test(folder)) {
      return term;
    }
  }

  return null;
}

export function guessCategoryFromPath(path: string): ReleaseCategory {
  const withoutAlbum = RELEASE_CATEGORIES.filter((category) => category !== 'Album');

  return guessFromPath(path, RELEASE_CATEGORIES, withoutAlbum, withoutAlbum) ?? 'Album';
}

export function guessSourceFromPath(path: string): ReleaseSource {
  const known = RELEASE_SOURCES.filter((source) => source !== 'Unknown');
  const delimited = known.filter((source) => source !== 'CD');

  return guessFromPath(path, known, known, delimited) ?? 'CD';
}

function isCategoryName(name: string): boolean {
  return RELEASE_CATEGORIES.some((category) => category === name);
}

/** True when the destination already looks organised into category folders. */
export async function guessGroupByCategory(scanRoot: string, destRoot: string | null): Promise<boolean> {
  const folder = destRoot ?? scanRoot;

  if (isCategoryName(basename(folder))) {
    return true;
  }

  const entries = await readdir(folder);

  return entries.every(isCategoryName);
}
