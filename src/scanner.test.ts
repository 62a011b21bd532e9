import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidPathError, UnreadableTagError } from './errors.js';
import { getReleaseDirs, hasAudioExtension, listFiles, loadDirectory } from './scanner.js';
import type { TagCodec, TagRecord } from './types.js';

function record(title: string): TagRecord {
  return {
    artists: ['Band'],
    releaseArtists: [],
    title,
    releaseTitle: 'Stuff',
    date: '2001',
    trackNumber: 1,
    totalTracks: null,
    discNumber: null,
    totalDiscs: null,
    genres: [],
    comment: null,
    properties: {
      codec: 'MP3',
      codecProfile: 'V0',
      bitrate: 245,
      sampleRate: 44100,
      bitDepth: null,
      lossless: false,
    },
  };
}

const codec: TagCodec = {
  async readTags(filePath) {
    if (basename(filePath).startsWith('bad')) {
      throw new UnreadableTagError(filePath, new Error('corrupt frame'));
    }

    return record(basename(filePath));
  },
  async writeTags() {},
};

describe('scanner', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'scanner-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  async function touch(...parts: string[]): Promise<void> {
    const file = join(root, ...parts);
    await mkdir(join(file, '..'), { recursive: true });
    await writeFile(file, '');
  }

  it('recognises audio extensions case-insensitively', () => {
    expect(hasAudioExtension('01 - Song.FLAC')).toBe(true);
    expect(hasAudioExtension('cover.jpg')).toBe(false);
  });

  it('returns a leaf folder holding audio as a release', async () => {
    await touch('Band - Stuff', '01.mp3');

    expect(await getReleaseDirs(root)).toEqual([join(root, 'Band - Stuff')]);
  });

  it('treats a folder of disc folders as one release', async () => {
    await touch('Band - Stuff', 'Disc 1', '01.mp3');
    await touch('Band - Stuff', 'Disc 2', '01.mp3');

    expect(await getReleaseDirs(root)).toEqual([join(root, 'Band - Stuff')]);
  });

  it('recurses into disc-like folders when there are more than twenty', async () => {
    for (let disc = 1; disc <= 21; disc++) {
      await touch('Box', `CD ${disc}`, '01.mp3');
    }

    const dirs = await getReleaseDirs(root);

    expect(dirs).toHaveLength(21);
    expect(dirs).not.toContain(join(root, 'Box'));
  });

  it('recurses when a subfolder is not a disc', async () => {
    await touch('Band', 'Band - First', '01.mp3');
    await touch('Band', 'Band - Second', '01.mp3');

    expect(await getReleaseDirs(root)).toEqual([
      join(root, 'Band', 'Band - First'),
      join(root, 'Band', 'Band - Second'),
    ]);
  });

  it('finds nothing in an empty folder', async () => {
    await mkdir(join(root, 'Empty'));

    expect(await getReleaseDirs(root)).toEqual([]);
  });

  it('ignores leaf folders without audio', async () => {
    await touch('Scans', 'cover.jpg');

    expect(await getReleaseDirs(root)).toEqual([]);
  });

  it('lists nested files with forward slashes', async () => {
    await touch('CD1', '01.mp3');
    await touch('cover.jpg');

    expect(await listFiles(root)).toEqual(['CD1/01.mp3', 'cover.jpg']);
  });

  describe('loadDirectory', () => {
    it('splits audio, other files and unreadable audio', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      await touch('01.mp3');
      await touch('bad.mp3');
      await touch('cover.jpg');

      const loaded = await loadDirectory(root, codec);

      expect([...loaded.audio.keys()]).toEqual(['01.mp3']);
      expect(loaded.audio.get('01.mp3')?.title).toBe('01.mp3');
      expect(loaded.audio.get('01.mp3')?.extension).toBe('.mp3');
      expect(loaded.nonAudio).toEqual(['cover.jpg']);
      expect(loaded.unreadable).toEqual(['bad.mp3']);
    });

    it('rejects a path that is not a folder', async () => {
      await expect(loadDirectory(join(root, 'missing'), codec)).rejects.toBeInstanceOf(InvalidPathError);
    });
  });
});
