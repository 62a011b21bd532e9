import { basename, extname } from 'node:path';

export interface ParsedFolderName {
  artist: string | null;
  year: string | null;
  title: string | null;
}

export interface ParsedTrackFilename {
  trackNumber: number | null;
  artist: string | null;
  title: string | null;
}

const NOISE_PATTERNS = [
  /\[.*?\]/g,
  /\{.*?\}/g,
];

const YEAR_PATTERN = /^(19|20)\d{2}$/;
const TRAILING_YEAR_PATTERN = /\s*\(((?:19|20)\d{2})\)\s*$/;
const TRACK_NUMBER_PATTERN = /^(\d{1,3})(?:[.\-\s_]+)/;
const SEPARATORS = [' - ', ' – ', ' — '];

function splitOnSeparators(value: string): string[] {
  for (const sep of SEPARATORS) {
    if (value.includes(sep)) {
      return value.split(sep).map((part) => part.trim()).filter(Boolean);
    }
  }

  return [value.trim()];
}

/**
 * Reads `Artist - YYYY - Title [tags]`, `Artist - Title (YYYY)` or
 * `Artist - Title` out of a release folder name.
 */
export function parseFolderName(folderName: string): ParsedFolderName {
  let cleaned = folderName;

  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  cleaned = cleaned.replace(/\s+/g, ' ').trim();

  let year: string | null = null;
  const trailingYear = cleaned.match(TRAILING_YEAR_PATTERN);

  if (trailingYear) {
    year = trailingYear[1];
    cleaned = cleaned.replace(TRAILING_YEAR_PATTERN, '');
  }

  const parts = splitOnSeparators(cleaned);

  if (parts.length >= 3 && YEAR_PATTERN.test(parts[1])) {
    return {
      artist: parts[0],
      year: parts[1],
      title: parts.slice(2).join(' - '),
    };
  }

  if (parts.length >= 2) {
    return {
      artist: parts[0],
      year,
      title: parts.slice(1).join(' - '),
    };
  }

  return { artist: null, year, title: parts[0] || null };
}

export function parseTrackFilename(filePath: string): ParsedTrackFilename {
  const filename = basename(filePath, extname(filePath));
  const numberMatch = filename.match(TRACK_NUMBER_PATTERN);
  const trackNumber = numberMatch ? parseInt(numberMatch[1], 10) : null;
  const rest = numberMatch ? filename.slice(numberMatch[0].length) : filename;
  const parts = splitOnSeparators(rest.replace(/^-\s*/, ''));

  if (parts.length >= 2) {
    return {
      trackNumber,
      artist: parts[0],
      title: parts.slice(1).join(' - '),
    };
  }

  return { trackNumber, artist: null, title: parts[0] || null };
}
