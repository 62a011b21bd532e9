import { dirname } from 'node:path';
import type { Release, ReleaseCategory, ReleaseSource, Track } from './types.js';

export const VARIOUS_ARTISTS = 'Various Artists';

const ILLEGAL_PATH_CHARS = /[\\/:*?"<>|]/g;

export interface FolderNameOptions {
  codecShort: boolean;
  groupByCategory: boolean;
}

export function createRelease(
  tracks: Map<string, Track>,
  category: ReleaseCategory,
  source: ReleaseSource
): Release {
  return { tracks, category, source, numViolations: 0 };
}

/** The single value every item maps to, or null when they disagree or there are none. */
export function consensus<T>(items: Iterable<T>, key: (item: T) => string): T | null {
  let agreed: T | null = null;
  let agreedKey: string | null = null;

  for (const item of items) {
    const itemKey = key(item);

    if (agreedKey === null) {
      agreed = item;
      agreedKey = itemKey;
      continue;
    }

    if (itemKey !== agreedKey) {
      return null;
    }
  }

  return agreed;
}

export function trackReleaseArtists(track: Track): string[] {
  return track.releaseArtists.length > 0 ? track.releaseArtists : track.artists;
}

export function releaseArtists(release: Release): string[] {
  const artists = consensus(release.tracks.values(), (track) => trackReleaseArtists(track).join('\u0000'));
  return artists ? trackReleaseArtists(artists) : [];
}

export function releaseTitle(release: Release): string {
  const track = consensus(release.tracks.values(), (t) => t.releaseTitle ?? '');
  return track?.releaseTitle ?? '';
}

export function yearOf(date: string | null): string {
  const match = date?.match(/^(\d{4})/);
  return match ? match[1] : '';
}

export function releaseYear(release: Release): string {
  const track = consensus(release.tracks.values(), (t) => yearOf(t.date));
  return track ? yearOf(track.date) : '';
}

export function isVariousArtists(release: Release): boolean {
  const artists = releaseArtists(release);
  return artists.length === 1 && artists[0].toLowerCase() === VARIOUS_ARTISTS.toLowerCase();
}

export function trackCodecLabel(track: Track): string {
  const { codec, codecProfile, bitrate, bitDepth } = track.properties;

  if (codec === 'FLAC') {
    return bitDepth !== null && bitDepth >= 24 ? 'FLAC 24' : 'FLAC';
  }

  if (codec === 'MP3') {
    if (codecProfile && /^V\d$/.test(codecProfile)) {
      return `MP3 ${codecProfile}`;
    }

    if (bitrate !== null) {
      return `MP3 ${bitrate}`;
    }
  }

  return codec;
}

/** Codec label shared by every track, e.g. `FLAC` or `MP3 V0`; empty when mixed. */
export function releaseCodec(release: Release): string {
  const track = consensus(release.tracks.values(), trackCodecLabel);
  return track ? trackCodecLabel(track) : '';
}

export function releaseCodecFamily(release: Release): string {
  const track = consensus(release.tracks.values(), (t) => t.properties.codec);
  return track?.properties.codec ?? '';
}

export function shortCodec(codec: string): string {
  return codec.startsWith('MP3 ') ? codec.slice(4) : codec;
}

const LOSSLESS_CODECS = new Set(['FLAC', 'ALAC', 'PCM', 'WAV', 'AIFF', 'AIF', 'APE', 'WV', 'DSF']);

/**
 * Quality rank of a codec label. Copies sharing a label share a rank, so
 * only a better label can displace a release from its folder name.
 */
export function codecLabelRank(label: string): number {
  if (!label) {
    return 0;
  }

  if (label === 'FLAC 24') {
    return 2000;
  }

  if (LOSSLESS_CODECS.has(label)) {
    return 1000;
  }

  const vbr = /^MP3 V(\d)$/.exec(label);

  if (vbr) {
    return 300 - Number(vbr[1]) * 20;
  }

  const cbr = /^MP3 (\d+)$/.exec(label);

  if (cbr) {
    return Number(cbr[1]);
  }

  return 100;
}

export function codecRank(release: Release): number {
  return codecLabelRank(releaseCodec(release));
}

export function flattenArtists(artists: string[]): string {
  if (artists.length <= 1) {
    return artists[0] ?? '';
  }

  return `${artists.slice(0, -1).join(', ')} & ${artists[artists.length - 1]}`;
}

export function sanitizeName(name: string): string {
  return name
    .replace(ILLEGAL_PATH_CHARS, '-')
    .replace(/\s+/g, ' ')
    .replace(/[. ]+$/, '')
    .trim();
}

export function canValidateFolderName(release: Release): boolean {
  return releaseArtists(release).length > 0
    && releaseTitle(release) !== ''
    && releaseYear(release) !== ''
    && releaseCodec(release) !== '';
}

export function getFolderName(release: Release, options: FolderNameOptions): string {
  const artists = isVariousArtists(release) ? VARIOUS_ARTISTS : flattenArtists(releaseArtists(release));
  const codec = options.codecShort ? shortCodec(releaseCodec(release)) : releaseCodec(release);
  const category = release.category !== 'Album' && !options.groupByCategory ? ` [${release.category}]` : '';
  const source = release.source !== 'CD' && release.source !== 'Unknown' ? `${release.source} ` : '';

  return sanitizeName(`${artists} - ${releaseYear(release)} - ${releaseTitle(release)}${category} [${source}${codec}]`);
}

function padTrackNumber(trackNumber: number): string {
  return String(trackNumber).padStart(2, '0');
}

/**
 * Canonical file name for a track, keeping the subfolder it lives in
 * (disc folders). Null when the number or title is unknown.
 */
export function getTrackFilename(track: Track, currentPath: string, variousArtists: boolean): string | null {
  if (track.trackNumber === null || !track.title) {
    return null;
  }

  const artist = flattenArtists(track.artists);

  if (variousArtists && !artist) {
    return null;
  }

  const stem = variousArtists
    ? `${padTrackNumber(track.trackNumber)} - ${artist} - ${track.title}`
    : `${padTrackNumber(track.trackNumber)} - ${track.title}`;

  const folder = dirname(currentPath);
  const filename = `${sanitizeName(stem)}${track.extension}`;

  return folder === '.' ? filename : `${folder}/${filename}`;
}
