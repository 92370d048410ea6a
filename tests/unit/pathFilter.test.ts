import { describe, it, expect } from '@jest/globals';
import {
  isAcceptedPath,
  isAudioFile,
  isHiddenName,
  segmentsBelow,
  topLevelEntry,
} from '../../src/services/watchers/pathFilter.js';

describe('pathFilter', () => {
  it('splits paths below the root and rejects everything else', () => {
    expect(segmentsBelow('/inbox', '/inbox/ArtistX/Album/01.flac')).toEqual(['ArtistX', 'Album', '01.flac']);
    expect(segmentsBelow('/inbox', '/inbox')).toBeNull();
    expect(segmentsBelow('/inbox', '/elsewhere/file.flac')).toBeNull();
    expect(segmentsBelow('/inbox', '/inbox/../etc/passwd')).toBeNull();
  });

  it('treats dot and tilde names as hidden', () => {
    expect(isHiddenName('.DS_Store')).toBe(true);
    expect(isHiddenName('~partial')).toBe(true);
    expect(isHiddenName('Album')).toBe(false);
  });

  it('rejects hidden segments, ignore substrings and outside paths', () => {
    expect(isAcceptedPath('/inbox', '/inbox/ArtistX/01.flac', ['_UNPACK_'])).toBe(true);
    expect(isAcceptedPath('/inbox', '/inbox/ArtistX/.part/01.flac', [])).toBe(false);
    expect(isAcceptedPath('/inbox', '/inbox/ArtistX_UNPACK_/01.flac', ['_UNPACK_'])).toBe(false);
    expect(isAcceptedPath('/music/library', '/music/library/.beets/state', ['.beets'])).toBe(false);
    expect(isAcceptedPath('/inbox', '/tmp/01.flac', [])).toBe(false);
  });

  it('finds the top-level entry containing a path', () => {
    expect(topLevelEntry('/inbox', '/inbox/ArtistX/Album/01.flac')).toBe('/inbox/ArtistX');
    expect(topLevelEntry('/inbox', '/inbox/ArtistX')).toBe('/inbox/ArtistX');
    expect(topLevelEntry('/inbox', '/inbox')).toBeNull();
  });

  it('recognises audio extensions case-insensitively', () => {
    expect(isAudioFile('/a/01.FLAC')).toBe(true);
    expect(isAudioFile('/a/02.m4a')).toBe(true);
    expect(isAudioFile('/a/cover.jpg')).toBe(false);
  });
});
