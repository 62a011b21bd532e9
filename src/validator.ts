import levenshtein from 'fast-levenshtein';
import { parseFolderName, parseTrackFilename } from './parser.js';
import {
  consensus,
  flattenArtists,
  getTrackFilename,
  isVariousArtists,
  releaseCodec,
  trackReleaseArtists,
  VARIOUS_ARTISTS,
  yearOf,
} from './release.js';
import type {
  ReferenceCatalog,
  Release,
  ReleaseValidator,
  Track,
  Violation,
  ViolationType,
} from './types.js';

const CATALOG_SIMILARITY = 0.8;

export interface ValidatorOptions {
  catalog: ReferenceCatalog | null;
  forbiddenCommentSubstrings: string[];
}

function violation(type: ViolationType, message: string): Violation {
  return { type, message };
}

function hasForbiddenComment(track: Track, forbidden: string[]): boolean {
  const comment = track.comment?.toLowerCase();

  if (!comment) {
    return false;
  }

  return forbidden.some((substring) => comment.includes(substring.toLowerCase()));
}

function checkReleaseValue(
  tracks: Track[],
  type: ViolationType,
  label: string,
  read: (track: Track) => string
): Violation[] {
  if (tracks.some((track) => read(track) === '')) {
    return [violation(type, `Missing ${label}`)];
  }

  if (consensus(tracks, read) === null) {
    const values = [...new Set(tracks.map(read))];
    return [violation(type, `Inconsistent ${label}: ${values.map((v) => `'${v}'`).join(', ')}`)];
  }

  return [];
}

function checkTrackNumbers(release: Release): Violation[] {
  const violations: Violation[] = [];
  const seen = new Set<string>();

  for (const [filename, track] of release.tracks) {
    if (track.trackNumber === null) {
      violations.push(violation('track-number', `Missing track number: ${filename}`));
      continue;
    }

    const key = `${track.discNumber ?? 1}/${track.trackNumber}`;

    if (seen.has(key)) {
      violations.push(violation('track-number', `Duplicate track number ${track.trackNumber}: ${filename}`));
    }

    seen.add(key);
  }

  return violations;
}

export function validateRelease(release: Release, options: ValidatorOptions): Violation[] {
  const tracks = [...release.tracks.values()];
  const violations: Violation[] = [
    ...checkReleaseValue(tracks, 'release-artist', 'release artist', (t) => trackReleaseArtists(t).join(', ')),
    ...checkReleaseValue(tracks, 'release-title', 'release title', (t) => t.releaseTitle ?? ''),
    ...checkReleaseValue(tracks, 'release-date', 'release date', (t) => yearOf(t.date)),
    ...checkTrackNumbers(release),
  ];

  if (tracks.length > 0 && releaseCodec(release) === '') {
    violations.push(violation('codec', 'Tracks use more than one codec'));
  }

  const variousArtists = isVariousArtists(release);

  for (const [filename, track] of release.tracks) {
    if (!track.title) {
      violations.push(violation('track-title', `Missing track title: ${filename}`));
    }

    if (track.artists.length === 0) {
      violations.push(violation('track-artist', `Missing track artist: ${filename}`));
    }

    const canonical = getTrackFilename(track, filename, variousArtists);

    if (canonical !== null && canonical !== filename) {
      violations.push(violation('filename', `Invalid filename '${filename}' should be '${canonical}'`));
    }

    if (hasForbiddenComment(track, options.forbiddenCommentSubstrings)) {
      violations.push(violation('comment', `Forbidden comment: ${filename}`));
    }
  }

  return violations;
}

/** Most frequent value by key, earliest on ties; null for an empty list. */
function majority<T>(values: T[], key: (value: T) => string): T | null {
  const counts = new Map<string, { value: T; count: number }>();

  for (const value of values) {
    const k = key(value);
    const entry = counts.get(k);

    if (entry) {
      entry.count++;
    } else {
      counts.set(k, { value, count: 1 });
    }
  }

  let best: { value: T; count: number } | null = null;

  for (const entry of counts.values()) {
    if (!best || entry.count > best.count) {
      best = entry;
    }
  }

  return best?.value ?? null;
}

export function similarity(a: string, b: string): number {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  const maxLen = Math.max(left.length, right.length);

  if (maxLen === 0) {
    return 1;
  }

  return 1 - levenshtein.get(left, right) / maxLen;
}

function fixTrackFromFilename(track: Track, filename: string): Track {
  const parsed = parseTrackFilename(filename);

  return {
    ...track,
    trackNumber: track.trackNumber ?? parsed.trackNumber,
    title: track.title || parsed.title,
    artists: track.artists.length > 0 || !parsed.artist ? track.artists : [parsed.artist],
  };
}

function releaseArtistsFor(tracks: Track[], hintArtist: string | null): string[] {
  const tagged = tracks.filter((track) => track.releaseArtists.length > 0);
  const voted = majority(tagged.map((track) => track.releaseArtists), (artists) => artists.join('\u0000'));

  if (voted) {
    return voted;
  }

  const trackArtists = tracks.filter((track) => track.artists.length > 0).map((track) => track.artists);

  if (trackArtists.length > 0 && consensus(trackArtists, (artists) => artists.join('\u0000')) === null) {
    return [VARIOUS_ARTISTS];
  }

  return trackArtists[0] ?? (hintArtist ? [hintArtist] : []);
}

export async function fixRelease(
  release: Release,
  folderName: string,
  options: ValidatorOptions
): Promise<Release> {
  const hint = parseFolderName(folderName);
  const fixedTracks = new Map<string, Track>();

  for (const [filename, track] of release.tracks) {
    fixedTracks.set(filename, fixTrackFromFilename(track, filename));
  }

  const tracks = [...fixedTracks.values()];
  let artists = releaseArtistsFor(tracks, hint.artist);
  let title = majority(tracks.map((t) => t.releaseTitle ?? '').filter(Boolean), (t) => t) ?? hint.title;
  let year = majority(tracks.map((t) => yearOf(t.date)).filter(Boolean), (y) => y) ?? hint.year;

  if (options.catalog && artists.length > 0 && title) {
    const reference = await options.catalog.lookupRelease(flattenArtists(artists), title);

    if (reference && similarity(reference.title, title) >= CATALOG_SIMILARITY) {
      title = reference.title;
      year = year ?? reference.year;

      if (artists.length === 1 && similarity(reference.artist, artists[0]) >= CATALOG_SIMILARITY) {
        artists = [reference.artist];
      }
    }
  }

  const variousArtists = artists.length === 1 && artists[0] === VARIOUS_ARTISTS;

  for (const [filename, track] of fixedTracks) {
    const fixed: Track = {
      ...track,
      releaseArtists: artists.length > 0 ? artists : track.releaseArtists,
      releaseTitle: title ?? track.releaseTitle,
      date: year && yearOf(track.date) !== year ? year : track.date,
      artists: track.artists.length === 0 && !variousArtists ? artists : track.artists,
      comment: hasForbiddenComment(track, options.forbiddenCommentSubstrings) ? null : track.comment,
    };

    fixedTracks.set(filename, fixed);
  }

  return { ...release, tracks: fixedTracks };
}

export function createReleaseValidator(options: ValidatorOptions): ReleaseValidator & {
  addForbiddenCommentSubstring(substring: string): void;
} {
  const state: ValidatorOptions = {
    catalog: options.catalog,
    forbiddenCommentSubstrings: [...options.forbiddenCommentSubstrings],
  };

  return {
    validate: (release) => validateRelease(release, state),
    fix: (release, folderName) => fixRelease(release, folderName, state),
    addForbiddenCommentSubstring: (substring) => {
      state.forbiddenCommentSubstrings.push(substring);
    },
  };
}
