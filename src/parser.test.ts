import { describe, expect, it } from 'vitest';
import { parseFolderName, parseTrackFilename } from './parser.js';

describe('parseFolderName', () => {
  it('reads artist, year and title', () => {
    expect(parseFolderName('Band - 2001 - Stuff [FLAC]')).toEqual({ artist: 'Band', year: '2001', title: 'Stuff' });
  });

  it('reads a trailing year in parentheses', () => {
    expect(parseFolderName('Band - Stuff (1999)')).toEqual({ artist: 'Band', year: '1999', title: 'Stuff' });
  });

  it('reads artist and title without a year', () => {
    expect(parseFolderName('Band - Stuff - Deluxe')).toEqual({ artist: 'Band', year: null, title: 'Stuff - Deluxe' });
  });

  it('falls back to a bare title', () => {
    expect(parseFolderName('Stuff')).toEqual({ artist: null, year: null, title: 'Stuff' });
  });
});

describe('parseTrackFilename', () => {
  it('reads a numbered title', () => {
    expect(parseTrackFilename('01 - One.mp3')).toEqual({ trackNumber: 1, artist: null, title: 'One' });
  });

  it('reads a numbered artist and title inside a disc folder', () => {
    expect(parseTrackFilename('CD1/07. Band - Seven.flac')).toEqual({ trackNumber: 7, artist: 'Band', title: 'Seven' });
  });

  it('leaves the number empty when there is none', () => {
    expect(parseTrackFilename('One.mp3')).toEqual({ trackNumber: null, artist: null, title: 'One' });
  });
});
