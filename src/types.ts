export const RELEASE_CATEGORIES = [
  'Album',
  'EP',
  'Single',
  'Compilation',
  'Soundtrack',
  'Anthology',
  'Live Album',
  'Remix',
  'Bootleg',
  'Interview',
  'Mix',
  'Demo',
  'Concert Recording',
] as const;

export type ReleaseCategory = (typeof RELEASE_CATEGORIES)[number];

export const RELEASE_SOURCES = [
  'CD',
  'DVD',
  'Vinyl',
  'Soundboard',
  'SACD',
  'DAT',
  'Cassette',
  'WEB',
  'Blu-Ray',
  'Unknown',
] as const;

export type ReleaseSource = (typeof RELEASE_SOURCES)[number];

export const VIOLATION_TYPES = [
  'folder-name',
  'unreadable',
  'release-artist',
  'release-title',
  'release-date',
  'track-number',
  'track-title',
  'track-artist',
  'codec',
  'filename',
  'comment',
] as const;

export type ViolationType = (typeof VIOLATION_TYPES)[number];

export interface Violation {
  readonly type: ViolationType;
  readonly message: string;
}

export interface AudioProperties {
  codec: string;
  codecProfile: string | null;
  bitrate: number | null;
  sampleRate: number | null;
  bitDepth: number | null;
  lossless: boolean;
}

export interface TrackTags {
  artists: string[];
  releaseArtists: string[];
  title: string | null;
  releaseTitle: string | null;
  date: string | null;
  trackNumber: number | null;
  totalTracks: number | null;
  discNumber: number | null;
  totalDiscs: number | null;
  genres: string[];
  comment: string | null;
}

/** Neutral record produced by the tag codec, before it becomes a Track. */
export interface TagRecord extends TrackTags {
  properties: AudioProperties;
}

export interface Track extends TrackTags {
  extension: string;
  properties: AudioProperties;
}

export interface Release {
  tracks: Map<string, Track>;
  category: ReleaseCategory;
  source: ReleaseSource;
  numViolations: number;
}

export interface TagCodec {
  readTags(filePath: string): Promise<TagRecord>;
  writeTags(filePath: string, tags: TrackTags): Promise<void>;
}

export interface ReleaseValidator {
  validate(release: Release): Violation[];
  fix(release: Release, folderName: string): Promise<Release>;
}

export interface CatalogRelease {
  artist: string;
  title: string;
  year: string | null;
}

export interface ReferenceCatalog {
  lookupRelease(artist: string, title: string): Promise<CatalogRelease | null>;
}

export interface Config {
  catalogApiUrl: string | null;
  catalogCacheTtlSeconds: number;
  cacheDir: string;
  moveOnlyValid: boolean;
  forbiddenCommentSubstrings: string[];
  retryDelayMs: number;
}

export type Mode = 'validate' | 'fix' | 'releases';

export interface RunOptions {
  mode: Mode;
  root: string;
  showViolations: boolean;
  dryRun: boolean;
  groupByArtist: boolean;
  groupByCategory: boolean;
  fullCodecNames: boolean;
  destRoot: string | null;
  invalidRoot: string | null;
  moveInvalidType: ViolationType | null;
  duplicateRoot: string | null;
  expungeCommentSubstring: string | null;
}

export interface RunSummary {
  releases: number;
  violations: number;
  skipped: number;
}

export interface LoadedDirectory {
  audio: Map<string, Track>;
  nonAudio: string[];
  unreadable: string[];
}
