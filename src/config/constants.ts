/**
 * Application-wide Constants
 *
 * Centralized location for magic numbers and well-known names.
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  /** 1 second */
  ONE_SECOND: 1000,
  /** 5 seconds */
  FIVE_SECONDS: 5000,
  /** 1 minute */
  ONE_MINUTE: 60000,
  /** 5 minutes */
  FIVE_MINUTES: 300000,
  /** 1 hour */
  ONE_HOUR: 3600000,
} as const;

/**
 * Rate limiting configuration for the HTTP surface
 */
export const RATE_LIMITS = {
  /** API rate limit window */
  API_WINDOW: TIME.ONE_MINUTE,
  /** Max API requests per window */
  API_MAX_REQUESTS: 600,
  /** Max IPs to track in rate limiter */
  MAX_TRACKED_IPS: 10000,
} as const;

/**
 * Audio container extensions recognised by watchers, scans and stats
 */
export const AUDIO_EXTENSIONS: readonly string[] = [
  '.flac',
  '.mp3',
  '.m4a',
  '.ogg',
  '.opus',
  '.wav',
  '.aac',
];

export const COVER = {
  /** File written into every album directory */
  FILENAME: 'cover.jpg',
  /** Local candidates, tried in order */
  BASE_NAMES: ['cover', 'folder', 'front'],
  EXTENSIONS: ['.jpg', '.jpeg', '.png'],
  /** How many audio files are inspected for embedded artwork */
  EMBEDDED_PROBE_LIMIT: 5,
  ARCHIVE_BASE_URL: 'https://coverartarchive.org/release',
  USER_AGENT: 'library-conductor/1.0 (cover fetcher)',
  ARCHIVE_TIMEOUT_MS: 15000,
  /** Tagger lookup of the album's release id */
  LOOKUP_TIMEOUT_MS: 30000,
} as const;

/**
 * Well-known target for the catalog regeneration queue
 */
export const LIBRARY_TARGET = 'library';

/**
 * Lyrics queue priorities (lower dequeues first)
 */
export const LYRICS_PRIORITY = {
  NEW_TRACK: 1,
  SCAN: 2,
} as const;

/**
 * Timeouts for the tagger queries behind library statistics
 */
export const STATS_TIMEOUTS = {
  SUMMARY: 120000,
  LISTING: 180000,
  MISSING: 300000,
} as const;

/**
 * Per-command timeout for the playback-control client
 */
export const PLAYBACK_COMMAND_TIMEOUT_MS = 10000;

/**
 * Minutes assumed per track when estimating inbox play time
 */
export const ESTIMATED_MINUTES_PER_TRACK = 3;
