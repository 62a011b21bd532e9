import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathTooLongError } from './errors.js';
import { MAX_PATH_LENGTH, enforceMaxPath, shortenPath } from './path-length.js';

describe('shortenPath', () => {
  it('leaves paths within the limit alone', () => {
    expect(shortenPath('/music/Band - 2001 - Stuff [FLAC]/01 - One.flac')).toBeNull();
  });

  it('truncates to the limit keeping the extension', () => {
    const parent = `/${'a'.repeat(199)}`;
    const fullPath = `${parent}/${'b'.repeat(55)}.mp3`;

    expect(parent).toHaveLength(200);
    expect(fullPath).toHaveLength(260);

    const shortened = shortenPath(fullPath);

    expect(shortened).toBe(`${fullPath.slice(0, 249)}...mp3`);
    expect(shortened).toHaveLength(MAX_PATH_LENGTH);
  });

  it('does not treat a long suffix as an extension', () => {
    const fullPath = `/${'a'.repeat(199)}/${'b'.repeat(40)}.averylongsuffix`;
    const shortened = shortenPath(fullPath);

    expect(shortened).toBe(`${fullPath.slice(0, 253)}..`);
  });

  it('refuses when the parent alone is too long', () => {
    const fullPath = `/${'a'.repeat(244)}/${'b'.repeat(20)}.mp3`;

    expect(() => shortenPath(fullPath)).toThrow(PathTooLongError);
  });
});

describe('enforceMaxPath', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'path-length-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('renames entries whose full path is too long', async () => {
    await writeFile(join(root, `${'c'.repeat(236)}.mp3`), '');
    await writeFile(join(root, '01 - One.mp3'), '');

    await enforceMaxPath(root);

    const names = await readdir(root);
    const long = names.find((name) => name !== '01 - One.mp3');

    expect(names).toHaveLength(2);
    expect(long?.endsWith('...mp3')).toBe(true);
    expect(join(root, long ?? '')).toHaveLength(MAX_PATH_LENGTH);
  });
});
