/**
 * Tag container access through music-metadata. Read-only: nothing here
 * decodes audio.
 */

import { parseFile } from 'music-metadata';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface EmbeddedPicture {
  format: string;
  data: Buffer;
}

/**
 * Front cover (or first picture) stored in the file's tags
 */
export async function readEmbeddedPicture(filePath: string): Promise<EmbeddedPicture | null> {
  try {
    const { common } = await parseFile(filePath, { duration: false });
    const pictures = common.picture ?? [];
    const front = pictures.find(picture => picture.type?.toLowerCase().includes('front')) ?? pictures[0];
    if (!front || front.data.length === 0) {
      return null;
    }
    return { format: front.format, data: front.data };
  } catch (error) {
    logger.debug('[audioTags] Could not read embedded picture', {
      service: 'audioTags',
      filePath,
      error: getErrorMessage(error),
    });
    return null;
  }
}

/**
 * Whether the tags already carry non-empty lyrics. Unreadable files
 * count as having none.
 */
export async function hasEmbeddedLyrics(filePath: string): Promise<boolean> {
  try {
    const { common } = await parseFile(filePath, { skipCovers: true, duration: false });
    return (common.lyrics ?? []).some(text => text.trim().length > 0);
  } catch (error) {
    logger.debug('[audioTags] Could not read lyrics tag', {
      service: 'audioTags',
      filePath,
      error: getErrorMessage(error),
    });
    return false;
  }
}

/**
 * Duration in whole seconds, 0 when unknown
 */
export async function readDurationSeconds(filePath: string): Promise<number> {
  try {
    const { format } = await parseFile(filePath, { skipCovers: true });
    return Math.floor(format.duration ?? 0);
  } catch {
    return 0;
  }
}
