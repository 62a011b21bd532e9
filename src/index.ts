#!/usr/bin/env node
import { join } from 'node:path';
import { Argument, Command, Option } from 'commander';
import chalk from 'chalk';
import { createReferenceCatalog } from './catalog.js';
import { CONFIG_FILE, loadConfig } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import { PERMISSION_RETRY } from './fs-utils.js';
import { readTags } from './metadata.js';
import { runMode } from './orchestrator.js';
import { resolveRunOptions, type CliFlags } from './options.js';
import { createReleaseValidator } from './validator.js';
import { writeTags } from './writer.js';
import { VIOLATION_TYPES, type Mode } from './types.js';

const MODES: readonly Mode[] = ['validate', 'fix', 'releases'];
const CATALOG_CACHE_FILE = 'catalog-cache.json';

function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

async function run(modeArg: string, path: string, flags: CliFlags): Promise<void> {
  if (!isMode(modeArg)) {
    throw new ConfigurationError(`Unknown mode '${modeArg}'`);
  }

  const config = await loadConfig(flags.config ?? CONFIG_FILE);
  const options = await resolveRunOptions(modeArg, path, flags);

  const catalog = config.catalogApiUrl
    ? createReferenceCatalog({
      apiUrl: config.catalogApiUrl,
      cacheFile: join(config.cacheDir, CATALOG_CACHE_FILE),
      ttlSeconds: config.catalogCacheTtlSeconds,
    })
    : null;

  const validator = createReleaseValidator({
    catalog,
    forbiddenCommentSubstrings: config.forbiddenCommentSubstrings,
  });

  if (options.expungeCommentSubstring) {
    validator.addForbiddenCommentSubstring(options.expungeCommentSubstring);
  }

  await runMode(options, {
    codec: { readTags, writeTags },
    validator,
    moveOnlyValid: config.moveOnlyValid,
    retry: { ...PERMISSION_RETRY, delayMs: config.retryDelayMs },
  });
}

const program = new Command();

program
  .name('release-sorter')
  .description('Validate, fix, rename and deduplicate music release folders')
  .addArgument(new Argument('<mode>', 'what to do with the releases found').choices(MODES))
  .argument('<path>', 'folder to scan for releases')
  .option('--show-violations', 'list every violation of each release')
  .option('--dry-run', 'report what would change without touching any file')
  .option('--group-by-artist', 'place moved releases in a folder per artist')
  .option('--group-by-category', 'place moved releases in a folder per category')
  .option('--full-codec-names', 'use full codec names in folder names, e.g. "MP3 V0"')
  .addOption(new Option('--move-fixed', 'move valid releases into the scan folder').conflicts('moveFixedTo'))
  .option('--move-fixed-to <dir>', 'move valid releases into this folder')
  .addOption(new Option('--move-invalid <kind>', 'move releases with this violation kind').choices(VIOLATION_TYPES))
  .option('--move-invalid-to <dir>', 'folder for releases moved by --move-invalid')
  .option('--move-duplicate-to <dir>', 'folder for lower-quality copies of the same release')
  .option('--expunge-comments-with-substring <text>', 'remove track comments containing this text')
  .option('--config <file>', 'config file to use instead of ./config.json')
  .action(async (mode: string, path: string, flags: CliFlags) => {
    try {
      await run(mode, path, flags);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(chalk.red(error.message));
        process.exitCode = 1;
        return;
      }

      console.error(chalk.red(describeError(error)));
      process.exitCode = 2;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(describeError(error)));
  process.exitCode = 1;
});
