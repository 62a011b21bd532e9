import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { guessCategoryFromPath, guessGroupByCategory, guessSourceFromPath } from './classify.js';

describe('guessCategoryFromPath', () => {
  it('prefers a bracketed tag over the parent folders', () => {
    expect(guessCategoryFromPath(join('/Root', 'Compilation', 'Various Artists - Comp [Mix]'))).toBe('Mix');
  });

  it('uses an ancestor named after a category', () => {
    expect(guessCategoryFromPath(join('/Root', 'Live Album', 'Band - Show'))).toBe('Live Album');
    expect(guessCategoryFromPath(join('/Root', 'Soundtrack', 'Composer', 'Composer - Film'))).toBe('Soundtrack');
  });

  it('only looks three folders up', () => {
    expect(guessCategoryFromPath(join('/Bootleg', 'a', 'b', 'c', 'Band - Show'))).toBe('Album');
  });

  it('does not count the release folder as its own ancestor', () => {
    expect(guessCategoryFromPath(join('/Root', 'Bootleg'))).toBe('Album');
  });

  it('recognises a trailing category word', () => {
    expect(guessCategoryFromPath(join('/Root', 'Band - Banging Tunes ep'))).toBe('EP');
  });

  it('recognises a delimited category word', () => {
    expect(guessCategoryFromPath(join('/Root', 'Band - Tunes-Demo-2001'))).toBe('Demo');
  });

  it('defaults to Album', () => {
    expect(guessCategoryFromPath(join('/Root', 'Band - Stuff'))).toBe('Album');
  });
});

describe('guessSourceFromPath', () => {
  it('reads a bracketed source', () => {
    expect(guessSourceFromPath(join('/music', 'Band - Stuff (WEB)'))).toBe('WEB');
  });

  it('finds a source at the start of a codec tag', () => {
    expect(guessSourceFromPath(join('/music', 'Band - 2001 - Stuff [Vinyl FLAC]'))).toBe('Vinyl');
  });

  it('uses an ancestor named after a source', () => {
    expect(guessSourceFromPath(join('/music', 'Cassette', 'Band - Stuff'))).toBe('Cassette');
  });

  it('defaults to CD', () => {
    expect(guessSourceFromPath(join('/music', 'Band - Stuff'))).toBe('CD');
  });
});

describe('guessGroupByCategory', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'classify-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('is true when every entry is a category folder', async () => {
    await mkdir(join(root, 'Album'));
    await mkdir(join(root, 'EP'));

    expect(await guessGroupByCategory(root, null)).toBe(true);
  });

  it('is false when releases sit directly in the folder', async () => {
    await mkdir(join(root, 'Album'));
    await mkdir(join(root, 'Band - Stuff'));

    expect(await guessGroupByCategory(root, null)).toBe(false);
  });

  it('looks at the destination rather than the scan folder', async () => {
    const destination = join(root, 'Single');
    await mkdir(destination);
    await mkdir(join(root, 'Band - Stuff'));

    expect(await guessGroupByCategory(root, destination)).toBe(true);
  });
});
