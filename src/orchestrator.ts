import { basename, join } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { guessCategoryFromPath, guessSourceFromPath } from './classify.js';
import { assembleDiscs } from './discs.js';
import { createDuplicateContext, resolveDuplicate, toUniqueRelease, type DuplicateContext } from './duplicates.js';
import { describeError } from './errors.js';
import type { RetryPolicy } from './fs-utils.js';
import { canLockPath } from './lock.js';
import { tagsEqual, tagsOf } from './metadata.js';
import { moveInvalidFolder, placeRelease, renameTrackFiles, type PlacementOptions } from './mover.js';
import { enforceMaxPath } from './path-length.js';
import { canValidateFolderName, createRelease, getFolderName } from './release.js';
import { listReleases, printFix, printSummary, printValidation } from './report.js';
import { getReleaseDirs, loadDirectory } from './scanner.js';
import type {
  Release,
  ReleaseValidator,
  RunOptions,
  RunSummary,
  TagCodec,
  Violation,
} from './types.js';

export interface RunDependencies {
  codec: TagCodec;
  validator: ReleaseValidator;
  moveOnlyValid: boolean;
  retry: RetryPolicy;
}

export interface RunContext extends RunDependencies {
  options: RunOptions;
}

export interface FolderNameCheck {
  skipComparison: boolean;
  groupByCategory: boolean;
  codecShort: boolean;
}

export function validateFolderName(release: Release, folderName: string, check: FolderNameCheck): Violation[] {
  if (!canValidateFolderName(release)) {
    return [{ type: 'folder-name', message: 'Cannot validate folder name' }];
  }

  const valid = getFolderName(release, { codecShort: check.codecShort, groupByCategory: check.groupByCategory });

  if (valid !== folderName && !check.skipComparison) {
    return [{ type: 'folder-name', message: `Invalid folder name '${folderName}' should be '${valid}'` }];
  }

  return [];
}

export function unreadableViolations(unreadable: string[]): Violation[] {
  return unreadable.map((file): Violation => ({ type: 'unreadable', message: `Unreadable file: ${file}` }));
}

async function loadRelease(dir: string, codec: TagCodec): Promise<{ release: Release; unreadable: string[] }> {
  const { audio, unreadable } = await loadDirectory(dir, codec);

  return {
    release: createRelease(audio, guessCategoryFromPath(dir), guessSourceFromPath(dir)),
    unreadable,
  };
}

function releaseViolations(
  release: Release,
  folderName: string,
  unreadable: string[],
  ctx: RunContext,
  skipComparison: boolean
): Violation[] {
  return [
    ...ctx.validator.validate(release),
    ...validateFolderName(release, folderName, {
      skipComparison,
      groupByCategory: ctx.options.groupByCategory,
      codecShort: !ctx.options.fullCodecNames,
    }),
    ...unreadableViolations(unreadable),
  ];
}

export async function validateReleases(releaseDirs: string[], ctx: RunContext): Promise<RunSummary> {
  const summary: RunSummary = { releases: 0, violations: 0, skipped: 0 };

  for (const dir of await assembleDiscs(releaseDirs, false)) {
    try {
      const { release, unreadable } = await loadRelease(dir, ctx.codec);
      const violations = releaseViolations(release, basename(dir), unreadable, ctx, false);

      printValidation(dir, violations, ctx.options.showViolations);
      summary.releases++;
      summary.violations += violations.length;
    } catch (error) {
      console.error(chalk.red(`Skipping ${dir}: ${describeError(error)}`));
      summary.skipped++;
    }
  }

  return summary;
}

async function writeChangedTags(before: Release, after: Release, dir: string, codec: TagCodec): Promise<void> {
  for (const [file, track] of after.tracks) {
    const original = before.tracks.get(file);

    if (!original || !tagsEqual(original, track)) {
      await codec.writeTags(join(dir, file), tagsOf(track));
    }
  }
}

interface FixOutcome {
  path: string;
  oldViolations: Violation[];
  violations: Violation[];
  duplicates: DuplicateContext;
}

async function fixOne(dir: string, ctx: RunContext, duplicates: DuplicateContext): Promise<FixOutcome> {
  const { options } = ctx;
  const folderName = basename(dir);
  const { release, unreadable } = await loadRelease(dir, ctx.codec);
  let fixed = await ctx.validator.fix(release, folderName);

  if (!options.dryRun) {
    await writeChangedTags(release, fixed, dir, ctx.codec);
  }

  fixed = await renameTrackFiles(fixed, dir, options.dryRun, ctx.retry);

  const oldViolations = releaseViolations(release, folderName, unreadable, ctx, false);
  const violations = releaseViolations(fixed, folderName, unreadable, ctx, true);
  fixed = { ...fixed, numViolations: violations.length };

  const placement: PlacementOptions = {
    dryRun: options.dryRun,
    groupByArtist: options.groupByArtist,
    groupByCategory: options.groupByCategory,
    fullCodecNames: options.fullCodecNames,
    destRoot: options.destRoot,
    duplicateRoot: options.duplicateRoot,
    moveOnlyValid: ctx.moveOnlyValid,
    scanRoot: options.root,
    retry: ctx.retry,
  };

  let path = dir;

  if (violations.length === 0) {
    const placed = await placeRelease(fixed, dir, placement);
    path = placed.path;

    if (options.duplicateRoot && !placed.movedDuplicate && !options.dryRun && canValidateFolderName(fixed)) {
      const resolution = await resolveDuplicate(
        duplicates,
        toUniqueRelease(fixed, path),
        options.duplicateRoot,
        getFolderName(fixed, { codecShort: !options.fullCodecNames, groupByCategory: options.groupByCategory })
      );
      path = resolution.path;
      duplicates = resolution.context;
    }
  } else {
    path = await moveInvalidFolder(dir, options.invalidRoot, violations, options.moveInvalidType, options.dryRun);

    if (path === dir && !ctx.moveOnlyValid) {
      path = (await placeRelease(fixed, dir, placement)).path;
    }
  }

  if (!options.dryRun) {
    await enforceMaxPath(path);
  }

  return { path, oldViolations, violations, duplicates };
}

/**
 * Fixes tags, file names and folder placement of every release. A release
 * that cannot be locked or fails part way is logged and skipped.
 */
export async function fixReleases(releaseDirs: string[], ctx: RunContext): Promise<RunSummary> {
  const summary: RunSummary = { releases: 0, violations: 0, skipped: 0 };
  let duplicates = createDuplicateContext();

  for (const dir of releaseDirs) {
    try {
      if (!(await canLockPath(dir))) {
        console.error(chalk.red(`Could not lock directory ${dir}`));
        summary.skipped++;
        continue;
      }

      const outcome = await fixOne(dir, ctx, duplicates);
      duplicates = outcome.duplicates;

      printFix(outcome.path, outcome.oldViolations, outcome.violations, ctx.options.showViolations);
      summary.releases++;
      summary.violations += outcome.violations.length;
    } catch (error) {
      console.error(chalk.red(`Skipping ${dir}: ${describeError(error)}`));
      summary.skipped++;
    }
  }

  return summary;
}

export async function runMode(options: RunOptions, deps: RunDependencies): Promise<RunSummary> {
  const spinner = ora('Discovering release directories...').start();
  let releaseDirs: string[];

  try {
    releaseDirs = await getReleaseDirs(options.root);
  } catch (error) {
    spinner.fail('Failed to scan');
    throw error;
  }

  spinner.succeed(`Found ${releaseDirs.length} release directories`);

  if (options.mode === 'releases') {
    return { releases: listReleases(releaseDirs), violations: 0, skipped: 0 };
  }

  const ctx: RunContext = { ...deps, options };
  const summary = options.mode === 'validate'
    ? await validateReleases(releaseDirs, ctx)
    : await fixReleases(await assembleDiscs(releaseDirs, !options.dryRun), ctx);

  printSummary(summary);

  return summary;
}
