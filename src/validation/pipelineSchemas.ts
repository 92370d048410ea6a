import { z } from 'zod';
import { QUEUE_NAMES } from '../services/jobQueue/types.js';

/**
 * Pipeline Validation Schemas
 *
 * Zod schemas for the orchestrator, library, inbox, cover and lyrics
 * endpoints. Query schemas accept the raw strings Express hands over.
 */

const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

const queryLimit = (fallback: number, max: number) =>
  z.coerce.number().int().min(1, 'limit must be at least 1').max(max).default(fallback);

export const queueParamSchema = z.object({
  queue: z.enum(QUEUE_NAMES),
});

export const triggerQueueSchema = z.object({
  target: z.string().trim().min(1, 'target must not be empty').optional(),
  priority: z.number().int().min(0).optional(),
});

export const watcherStatusQuerySchema = z.object({
  since_id: z.coerce.number().int().min(0).optional(),
  limit: queryLimit(50, 500),
});

export const forceRefreshQuerySchema = z.object({
  force_refresh: queryFlag,
});

export const albumsQuerySchema = z.object({
  limit: queryLimit(100, 10000),
});

export const recentAlbumsQuerySchema = z.object({
  limit: queryLimit(20, 1000),
});

export const inboxFolderQuerySchema = z.object({
  artist: z.string().min(1, 'artist is required'),
  album: z.string().min(1, 'album is required'),
});

export const coverRequestSchema = z.object({
  albumDir: z.string().trim().min(1, 'albumDir is required'),
});

export const lyricsPauseSchema = z.object({
  seconds: z.number().int().min(1).max(86400).optional(),
});

export const lyricsClearFailedSchema = z.object({
  target: z.string().trim().min(1).optional(),
});
