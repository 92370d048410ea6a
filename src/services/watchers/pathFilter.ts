import * as path from 'path';
import { AUDIO_EXTENSIONS } from '../../config/constants.js';

/**
 * Path segments below `root`, or null when `filePath` is the root itself
 * or lies outside it
 */
export function segmentsBelow(root: string, filePath: string): string[] | null {
  const relative = path.relative(path.resolve(root), path.resolve(filePath));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return relative.split(path.sep);
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.') || name.startsWith('~');
}

/**
 * Whether a notification for `filePath` may reach a queue: inside the
 * root, no hidden segment, no ignore substring.
 */
export function isAcceptedPath(root: string, filePath: string, ignore: readonly string[]): boolean {
  const segments = segmentsBelow(root, filePath);
  if (!segments) {
    return false;
  }
  if (segments.some(isHiddenName)) {
    return false;
  }
  return !ignore.some(fragment => fragment !== '' && filePath.includes(fragment));
}

/**
 * First-level entry under the root that contains `filePath`,
 * e.g. /inbox/ArtistX for /inbox/ArtistX/Album/01.flac
 */
export function topLevelEntry(root: string, filePath: string): string | null {
  const segments = segmentsBelow(root, filePath);
  const first = segments?.[0];
  return first === undefined ? null : path.join(path.resolve(root), first);
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}
