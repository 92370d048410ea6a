import { z } from 'zod';

/**
 * Download Service Validation Schemas
 */

export const downloadSearchQuerySchema = z.object({
  artist: z.string().trim().min(1, 'artist is required'),
  album: z.string().trim().min(1, 'album is required'),
  track: z.string().trim().min(1).optional(),
  file_type: z
    .string()
    .trim()
    .regex(/^[a-z0-9]+$/i, 'file_type must be an extension without dot')
    .default('flac'),
});

export const queueDownloadSchema = z.object({
  username: z.string().min(1, 'username is required'),
  filename: z.string().min(1, 'filename is required'),
});
