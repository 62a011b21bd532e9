import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { guessGroupByCategory } from './classify.js';
import { ConfigurationError } from './errors.js';
import { VIOLATION_TYPES, type Mode, type RunOptions, type ViolationType } from './types.js';

/** Flags as commander hands them over. */
export interface CliFlags {
  showViolations?: boolean;
  dryRun?: boolean;
  groupByArtist?: boolean;
  groupByCategory?: boolean;
  fullCodecNames?: boolean;
  moveFixed?: boolean;
  moveFixedTo?: string;
  moveInvalid?: string;
  moveInvalidTo?: string;
  moveDuplicateTo?: string;
  expungeCommentsWithSubstring?: string;
  config?: string;
}

async function isDirectory(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => null);
  return info?.isDirectory() ?? false;
}

async function requireDirectory(path: string | undefined, flag: string): Promise<string | null> {
  if (path === undefined) {
    return null;
  }

  const resolved = resolve(path);

  if (!(await isDirectory(resolved))) {
    throw new ConfigurationError(`${flag}: not a folder: ${path}`);
  }

  return resolved;
}

function isViolationType(value: string): value is ViolationType {
  return VIOLATION_TYPES.some((type) => type === value);
}

function parseMoveInvalid(flags: CliFlags): ViolationType | null {
  if (flags.moveInvalid === undefined && flags.moveInvalidTo === undefined) {
    return null;
  }

  if (flags.moveInvalid === undefined || flags.moveInvalidTo === undefined) {
    throw new ConfigurationError('--move-invalid and --move-invalid-to must be used together');
  }

  if (!isViolationType(flags.moveInvalid)) {
    throw new ConfigurationError(
      `Unknown violation kind '${flags.moveInvalid}', expected one of: ${VIOLATION_TYPES.join(', ')}`
    );
  }

  return flags.moveInvalid;
}

export async function resolveRunOptions(mode: Mode, path: string, flags: CliFlags): Promise<RunOptions> {
  const root = resolve(path);

  if (!(await isDirectory(root))) {
    throw new ConfigurationError(`Not a folder: ${path}`);
  }

  if (flags.moveFixed && flags.moveFixedTo !== undefined) {
    throw new ConfigurationError('--move-fixed and --move-fixed-to cannot be used together');
  }

  const moveInvalidType = parseMoveInvalid(flags);
  const destRoot = flags.moveFixed ? root : await requireDirectory(flags.moveFixedTo, '--move-fixed-to');
  const invalidRoot = await requireDirectory(flags.moveInvalidTo, '--move-invalid-to');
  const duplicateRoot = await requireDirectory(flags.moveDuplicateTo, '--move-duplicate-to');
  const groupByCategory = flags.groupByCategory ?? (await guessGroupByCategory(root, destRoot));

  return {
    mode,
    root,
    showViolations: flags.showViolations ?? false,
    dryRun: flags.dryRun ?? false,
    groupByArtist: flags.groupByArtist ?? false,
    groupByCategory,
    fullCodecNames: flags.fullCodecNames ?? false,
    destRoot,
    invalidRoot,
    moveInvalidType,
    duplicateRoot,
    expungeCommentSubstring: flags.expungeCommentsWithSubstring ?? null,
  };
}
