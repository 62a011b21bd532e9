import { readdir, stat } from 'node:fs/promises';
import { join, extname, relative, sep } from 'node:path';
import type { Dirent } from 'node:fs';
import chalk from 'chalk';
import { InvalidPathError, UnreadableTagError } from './errors.js';
import { createTrack } from './metadata.js';
import type { LoadedDirectory, TagCodec, Track } from './types.js';

const AUDIO_EXTENSIONS = new Set([
  '.mp3', '.flac', '.m4a', '.mp4', '.aac', '.ogg', '.oga', '.opus',
  '.wav', '.aiff', '.aif', '.ape', '.wv', '.wma', '.mpc', '.dsf',
]);

const DISC_DIR_PATTERN = /(disc|disk|cd) ?\d{1,2}/i;
const MAX_DISC_DIRS = 20;

export function hasAudioExtension(filename: string): boolean {
  return AUDIO_EXTENSIONS.has(extname(filename).toLowerCase());
}

async function readSortedEntries(dir: string): Promise<Dirent[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function containsAudio(dir: string): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.some((entry) => entry.isFile() && hasAudioExtension(entry.name));
}

export async function isDiscDirectory(parent: string, name: string): Promise<boolean> {
  if (!DISC_DIR_PATTERN.test(name)) {
    return false;
  }

  return containsAudio(join(parent, name));
}

async function allDiscDirectories(dir: string, subdirs: string[]): Promise<boolean> {
  if (subdirs.length > MAX_DISC_DIRS) {
    return false;
  }

  for (const name of subdirs) {
    if (!(await isDiscDirectory(dir, name))) {
      return false;
    }
  }

  return true;
}

/**
 * Depth-first walk yielding every release directory under `dir`: a leaf
 * holding audio, or a directory whose subdirectories are all discs.
 */
export async function* walkReleaseDirs(dir: string): AsyncGenerator<string> {
  const entries = await readSortedEntries(dir);
  const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  const subdirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);

  if (subdirs.length === 0) {
    if (files.some(hasAudioExtension)) {
      yield dir;
    }

    return;
  }

  if (await allDiscDirectories(dir, subdirs)) {
    yield dir;
    return;
  }

  for (const name of subdirs) {
    yield* walkReleaseDirs(join(dir, name));
  }
}

export async function getReleaseDirs(root: string): Promise<string[]> {
  const releaseDirs: string[] = [];

  for await (const dir of walkReleaseDirs(root)) {
    releaseDirs.push(dir);
  }

  return releaseDirs;
}

/** Lists every file under `dir`, relative to it, with `/` separators. */
export async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];

  async function visit(current: string): Promise<void> {
    for (const entry of await readSortedEntries(current)) {
      const fullPath = join(current, entry.name);

      if (entry.isDirectory()) {
        await visit(fullPath);
        continue;
      }

      if (entry.isFile()) {
        files.push(relative(dir, fullPath).split(sep).join('/'));
      }
    }
  }

  await visit(dir);

  return files;
}

export async function loadDirectory(dir: string, codec: TagCodec): Promise<LoadedDirectory> {
  const info = await stat(dir).catch(() => null);

  if (!info?.isDirectory()) {
    throw new InvalidPathError(`Not a folder: ${dir}`);
  }

  const audio = new Map<string, Track>();
  const nonAudio: string[] = [];
  const unreadable: string[] = [];

  for (const file of await listFiles(dir)) {
    if (!hasAudioExtension(file)) {
      nonAudio.push(file);
      continue;
    }

    try {
      const record = await codec.readTags(join(dir, file));
      audio.set(file, createTrack(record, file));
    } catch (error) {
      if (!(error instanceof UnreadableTagError)) {
        throw error;
      }

      console.error(chalk.red(error.message));
      unreadable.push(file);
    }
  }

  return { audio, nonAudio, unreadable };
}
