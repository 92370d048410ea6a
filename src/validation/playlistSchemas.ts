import { z } from 'zod';

/**
 * Playlist Validation Schemas
 */

export const playlistTrackSchema = z
  .object({
    uri: z.string().min(1, 'Track uri is required'),
    title: z.string().optional(),
    artist: z.string().optional(),
    album: z.string().optional(),
  })
  .passthrough();

export const buildPlaylistSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(255, 'Name must be 255 characters or less')
    .regex(/^[^/\\\0]+$/, 'Name must not contain path separators'),
  tracks: z.array(playlistTrackSchema).min(1, 'At least one track is required'),
});
