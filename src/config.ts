import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, describeError, errorCode } from './errors.js';
import type { Config } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const DEFAULT_CONFIG: Config = {
  catalogApiUrl: null,
  catalogCacheTtlSeconds: 5 * 365 * 24 * 60 * 60,
  cacheDir: join(homedir(), '.release-sorter'),
  moveOnlyValid: true,
  forbiddenCommentSubstrings: [],
  retryDelayMs: 1000,
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function invalidKey(key: string, expected: string): ConfigurationError {
  return new ConfigurationError(`Invalid config value for '${key}': expected ${expected}`);
}

/** Merges a parsed config.json over the defaults, checking every known key. */
export function parseConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Config must be a JSON object');
  }

  const config: Config = { ...DEFAULT_CONFIG, forbiddenCommentSubstrings: [...DEFAULT_CONFIG.forbiddenCommentSubstrings] };

  if ('catalogApiUrl' in raw) {
    const value = raw.catalogApiUrl;

    if (value !== null && typeof value !== 'string') {
      throw invalidKey('catalogApiUrl', 'a URL string or null');
    }

    config.catalogApiUrl = value;
  }

  if ('catalogCacheTtlSeconds' in raw) {
    const value = raw.catalogCacheTtlSeconds;

    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw invalidKey('catalogCacheTtlSeconds', 'a non-negative number');
    }

    config.catalogCacheTtlSeconds = value;
  }

  if ('cacheDir' in raw) {
    if (typeof raw.cacheDir !== 'string') {
      throw invalidKey('cacheDir', 'a string');
    }

    config.cacheDir = expandPath(raw.cacheDir);
  }

  if ('moveOnlyValid' in raw) {
    if (typeof raw.moveOnlyValid !== 'boolean') {
      throw invalidKey('moveOnlyValid', 'a boolean');
    }

    config.moveOnlyValid = raw.moveOnlyValid;
  }

  if ('forbiddenCommentSubstrings' in raw) {
    if (!isStringArray(raw.forbiddenCommentSubstrings)) {
      throw invalidKey('forbiddenCommentSubstrings', 'an array of strings');
    }

    config.forbiddenCommentSubstrings = [...raw.forbiddenCommentSubstrings];
  }

  if ('retryDelayMs' in raw) {
    const value = raw.retryDelayMs;

    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw invalidKey('retryDelayMs', 'a non-negative number');
    }

    config.retryDelayMs = value;
  }

  return config;
}

export async function loadConfig(configFile: string = CONFIG_FILE): Promise<Config> {
  let data: string;

  try {
    data = await readFile(configFile, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return parseConfig({});
    }

    throw new ConfigurationError(`Could not read config file ${configFile}: ${describeError(error)}`);
  }

  let raw: unknown;

  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${configFile}: ${describeError(error)}`);
  }

  return parseConfig(raw);
}
