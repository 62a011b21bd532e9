import { extname } from 'node:path';
import { parseFile } from 'music-metadata';
import { UnreadableTagError } from './errors.js';
import type { AudioProperties, TagRecord, Track, TrackTags } from './types.js';

const LOSSLESS_CODECS = new Set(['FLAC', 'ALAC', 'PCM', 'APE', 'WAVPACK', 'DSD']);

export function normalizeCodec(codec: string | undefined, filePath: string): string {
  const value = (codec ?? '').toLowerCase();

  if (value.includes('layer 3') || value === 'mp3') return 'MP3';
  if (value.includes('flac')) return 'FLAC';
  if (value.includes('alac')) return 'ALAC';
  if (value.includes('aac') || value.includes('mp4a')) return 'AAC';
  if (value.includes('vorbis')) return 'Vorbis';
  if (value.includes('opus')) return 'Opus';
  if (value.includes('pcm')) return 'PCM';

  const extension = extname(filePath).slice(1).toUpperCase();

  return extension || 'UNKNOWN';
}

function commentText(comments: readonly unknown[] | undefined): string | null {
  const first = comments?.[0];

  if (typeof first === 'string') {
    return first;
  }

  if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
    return first.text;
  }

  return null;
}

export async function readTags(filePath: string): Promise<TagRecord> {
  try {
    const metadata = await parseFile(filePath, { duration: false });
    const { common, format } = metadata;
    const codec = normalizeCodec(format.codec, filePath);

    const properties: AudioProperties = {
      codec,
      codecProfile: format.codecProfile ?? null,
      bitrate: format.bitrate ? Math.round(format.bitrate / 1000) : null,
      sampleRate: format.sampleRate ?? null,
      bitDepth: format.bitsPerSample ?? null,
      lossless: format.lossless ?? LOSSLESS_CODECS.has(codec.toUpperCase()),
    };

    return {
      artists: common.artists ?? (common.artist ? [common.artist] : []),
      releaseArtists: common.albumartist ? [common.albumartist] : [],
      title: common.title ?? null,
      releaseTitle: common.album ?? null,
      date: common.date ?? (common.year ? String(common.year) : null),
      trackNumber: common.track.no ?? null,
      totalTracks: common.track.of ?? null,
      discNumber: common.disk.no ?? null,
      totalDiscs: common.disk.of ?? null,
      genres: common.genre ?? [],
      comment: commentText(common.comment),
      properties,
    };
  } catch (error) {
    throw new UnreadableTagError(filePath, error);
  }
}

export function createTrack(record: TagRecord, filename: string): Track {
  return {
    artists: [...record.artists],
    releaseArtists: [...record.releaseArtists],
    title: record.title,
    releaseTitle: record.releaseTitle,
    date: record.date,
    trackNumber: record.trackNumber,
    totalTracks: record.totalTracks,
    discNumber: record.discNumber,
    totalDiscs: record.totalDiscs,
    genres: [...record.genres],
    comment: record.comment,
    extension: extname(filename).toLowerCase(),
    properties: { ...record.properties },
  };
}

export function tagsOf(tags: TrackTags): TrackTags {
  return {
    artists: tags.artists,
    releaseArtists: tags.releaseArtists,
    title: tags.title,
    releaseTitle: tags.releaseTitle,
    date: tags.date,
    trackNumber: tags.trackNumber,
    totalTracks: tags.totalTracks,
    discNumber: tags.discNumber,
    totalDiscs: tags.totalDiscs,
    genres: tags.genres,
    comment: tags.comment,
  };
}

export function tagsEqual(a: TrackTags, b: TrackTags): boolean {
  return JSON.stringify(tagsOf(a)) === JSON.stringify(tagsOf(b));
}
