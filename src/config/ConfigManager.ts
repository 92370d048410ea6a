import dotenv from 'dotenv';
import { AppConfig, DebouncePolicy, QueueSettings, ServerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

const DEBOUNCE_POLICIES: DebouncePolicy[] = ['fixed-delay', 'settling-timer'];

export class ConfigManager {
  private static instance: ConfigManager;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Server configuration
    config.server.port = this.getNumber('PORT', config.server.port);
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, [
      'development',
      'production',
      'test',
    ]);

    // Paths
    config.paths.inboxRoot = this.getString('INBOX_PATH', config.paths.inboxRoot);
    config.paths.libraryRoot = this.getString('LIBRARY_PATH', config.paths.libraryRoot);
    config.paths.albumsFile = this.getString('ALBUMS_FILE', config.paths.albumsFile);
    config.paths.recentAlbumsFile = this.getString('RECENT_ALBUMS_FILE', config.paths.recentAlbumsFile);
    config.paths.playlistDir = this.getString('PLAYLIST_DIR', config.paths.playlistDir);
    config.paths.leaseRecordFile = this.getString('IMPORT_LOCK_FILE', config.paths.leaseRecordFile);

    // External tools
    config.tagger.command = this.getString('TAGGER_COMMAND', config.tagger.command);
    config.tagger.configFile = this.getString('TAGGER_CONFIG', config.tagger.configFile);
    config.catalog.regenerateCommand = this.getStringArray(
      'REGEN_COMMAND',
      config.catalog.regenerateCommand,
      ' '
    );
    config.playback.command = this.getString('PLAYBACK_COMMAND', config.playback.command);
    config.playback.host = this.getString('MPD_HOST', config.playback.host);
    config.playback.port = this.getNumber('MPD_PORT', config.playback.port);
    config.playback.uriPrefix = this.getString('PLAYBACK_URI_PREFIX', config.playback.uriPrefix);

    // Companion download service (optional)
    config.downloads.baseUrl = this.getString('DOWNLOAD_SERVICE_URL', config.downloads.baseUrl);
    config.downloads.apiKey = process.env.DOWNLOAD_SERVICE_API_KEY;

    // Queues
    config.queues.inbox = this.getQueueSettings('INBOX', config.queues.inbox);
    config.queues.library = this.getQueueSettings('LIBRARY', config.queues.library);
    config.queues.cover = this.getQueueSettings('COVER', config.queues.cover);
    config.queues.lyrics = this.getQueueSettings('LYRICS', config.queues.lyrics);

    // Lyrics rate limiting
    config.lyrics.rateLimit = this.getNumber('LYRICS_RATE_LIMIT', config.lyrics.rateLimit);
    config.lyrics.cooldownMs = this.getNumber('LYRICS_COOLDOWN_MS', config.lyrics.cooldownMs);
    config.lyrics.maxRetries = this.getNumber('LYRICS_MAX_RETRIES', config.lyrics.maxRetries);
    config.lyrics.autoQueue = this.getBoolean('LYRICS_AUTO_QUEUE', config.lyrics.autoQueue);

    // Caches
    config.cache.inboxStatsTtlMs = this.getNumber('INBOX_STATS_TTL_MS', config.cache.inboxStatsTtlMs);
    config.cache.libraryStatsTtlMs = this.getNumber(
      'LIBRARY_STATS_TTL_MS',
      config.cache.libraryStatsTtlMs
    );

    // Watchers
    config.watch.inboxIgnore = this.getStringArray('INBOX_IGNORE', config.watch.inboxIgnore);
    config.watch.libraryIgnore = this.getStringArray('LIBRARY_IGNORE', config.watch.libraryIgnore);

    // Import lease
    config.lease.backend = this.getEnum('LEASE_BACKEND', config.lease.backend, ['socket', 'memory']);
    config.lease.key = this.getString('LEASE_KEY', config.lease.key);

    // Inbox cleanup
    config.cleanup.enabled = this.getBoolean('INBOX_CLEANUP_ENABLED', config.cleanup.enabled);
    config.cleanup.schedule = this.getString('INBOX_CLEANUP_SCHEDULE', config.cleanup.schedule);

    config.eventLogCapacity = this.getNumber('EVENT_LOG_CAPACITY', config.eventLogCapacity);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getQueueSettings(prefix: string, defaults: QueueSettings): QueueSettings {
    return {
      debouncePolicy: this.getEnum(`${prefix}_DEBOUNCE_POLICY`, defaults.debouncePolicy, DEBOUNCE_POLICIES),
      debounceMs: this.getNumber(`${prefix}_DEBOUNCE_MS`, defaults.debounceMs),
      actionTimeoutMs: this.getNumber(`${prefix}_TIMEOUT_MS`, defaults.actionTimeoutMs),
    };
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue: string[], separator = ','): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(separator)
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (!match) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    validateConfig(this.config);
  }
}

/**
 * Cross-field checks that the typed getters cannot express.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  for (const [name, settings] of Object.entries(config.queues)) {
    if (typeof settings === 'number') {
      continue;
    }
    if (settings.debounceMs < 0) {
      errors.push(`Debounce window for ${name} must not be negative`);
    }
    if (settings.actionTimeoutMs < 0) {
      errors.push(`Action timeout for ${name} must not be negative`);
    }
  }

  if (config.queues.popTimeoutMs <= 0) {
    errors.push('Queue pop timeout must be positive');
  }
  if (config.lyrics.rateLimit < 1) {
    errors.push('Lyrics rate limit must be at least 1 request per window');
  }
  if (config.lyrics.maxRetries < 1) {
    errors.push('Lyrics max retries must be at least 1');
  }
  if (config.catalog.regenerateCommand.length === 0) {
    errors.push('Catalog regeneration command is required');
  }
  if (!config.tagger.command) {
    errors.push('Tagger command is required');
  }
  if (config.eventLogCapacity < 1) {
    errors.push('Event log capacity must be at least 1');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'config',
      `Configuration validation failed:\n${errors.join('\n')}`
    );
  }
}
