import { extname, dirname, basename, join } from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { rename, unlink } from 'node:fs/promises';
import NodeID3 from 'node-id3';
import { describeError } from './errors.js';
import type { TrackTags } from './types.js';

const execFileAsync = promisify(execFile);

async function checkFfmpeg(): Promise<boolean> {
  try {
    await execFileAsync('ffmpeg', ['-version']);
    return true;
  } catch {
    return false;
  }
}

function formatPosition(no: number | null, of: number | null): string | undefined {
  if (no === null) {
    return undefined;
  }

  return of === null ? String(no) : `${no}/${of}`;
}

function joinArtists(artists: string[]): string {
  return artists.join('; ');
}

function buildId3Tags(tags: TrackTags): NodeID3.Tags {
  const id3: NodeID3.Tags = {
    artist: joinArtists(tags.artists),
    performerInfo: joinArtists(tags.releaseArtists),
    title: tags.title ?? '',
    album: tags.releaseTitle ?? '',
    year: tags.date ?? '',
    genre: tags.genres.join('; '),
    comment: { language: 'eng', text: tags.comment ?? '' },
  };

  const trackNumber = formatPosition(tags.trackNumber, tags.totalTracks);
  const partOfSet = formatPosition(tags.discNumber, tags.totalDiscs);

  if (trackNumber) {
    id3.trackNumber = trackNumber;
  }

  if (partOfSet) {
    id3.partOfSet = partOfSet;
  }

  return id3;
}

async function writeMp3Tags(filePath: string, tags: TrackTags): Promise<void> {
  const result = NodeID3.update(buildId3Tags(tags), filePath);

  if (result !== true) {
    throw new Error(`Failed to write MP3 tags to ${filePath}: ${describeError(result)}`);
  }
}

export function buildFfmpegMetadataArgs(tags: TrackTags): string[] {
  const fields: Array<[string, string]> = [
    ['artist', joinArtists(tags.artists)],
    ['album_artist', joinArtists(tags.releaseArtists)],
    ['title', tags.title ?? ''],
    ['album', tags.releaseTitle ?? ''],
    ['date', tags.date ?? ''],
    ['track', formatPosition(tags.trackNumber, tags.totalTracks) ?? ''],
    ['disc', formatPosition(tags.discNumber, tags.totalDiscs) ?? ''],
    ['genre', tags.genres.join('; ')],
    ['comment', tags.comment ?? ''],
  ];

  return fields.flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
}

async function writeWithFfmpeg(filePath: string, tags: TrackTags): Promise<void> {
  const hasFfmpeg = await checkFfmpeg();

  if (!hasFfmpeg) {
    throw new Error('ffmpeg is required for non-MP3 files. Please install ffmpeg.');
  }

  const extension = extname(filePath);
  const tempPath = join(dirname(filePath), `${basename(filePath, extension)}_temp${extension}`);

  try {
    await execFileAsync('ffmpeg', [
      '-y',
      '-i', filePath,
      '-map', '0',
      '-c', 'copy',
      ...buildFfmpegMetadataArgs(tags),
      tempPath,
    ]);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }

  await rename(tempPath, filePath);
}

export async function writeTags(filePath: string, tags: TrackTags): Promise<void> {
  if (extname(filePath).toLowerCase() === '.mp3') {
    await writeMp3Tags(filePath, tags);
    return;
  }

  await writeWithFfmpeg(filePath, tags);
}
