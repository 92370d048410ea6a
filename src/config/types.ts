export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface PathsConfig {
  inboxRoot: string;
  libraryRoot: string;
  albumsFile: string;
  recentAlbumsFile: string;
  playlistDir: string;
  leaseRecordFile: string;
}

export interface TaggerConfig {
  command: string;
  configFile: string;
}

export interface CatalogConfig {
  regenerateCommand: string[];
}

export interface PlaybackConfig {
  command: string;
  host: string;
  port: number;
  uriPrefix: string;
}

export interface DownloadServiceConfig {
  baseUrl: string;
  apiKey?: string | undefined;
  searchWaitMs: number;
  timeoutMs: number;
}

export type DebouncePolicy = 'fixed-delay' | 'settling-timer';

export interface QueueSettings {
  debouncePolicy: DebouncePolicy;
  debounceMs: number;
  /** 0 disables the timeout */
  actionTimeoutMs: number;
}

export interface QueuesConfig {
  inbox: QueueSettings;
  library: QueueSettings;
  cover: QueueSettings;
  lyrics: QueueSettings;
  popTimeoutMs: number;
}

export interface LyricsConfig {
  rateLimit: number;
  windowMs: number;
  cooldownMs: number;
  maxRetries: number;
  autoQueue: boolean;
}

export interface CacheConfig {
  inboxStatsTtlMs: number;
  libraryStatsTtlMs: number;
}

export interface WatchConfig {
  inboxIgnore: string[];
  libraryIgnore: string[];
}

export interface LeaseConfig {
  backend: 'socket' | 'memory';
  key: string;
}

export interface CleanupConfig {
  enabled: boolean;
  schedule: string;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  paths: PathsConfig;
  tagger: TaggerConfig;
  catalog: CatalogConfig;
  playback: PlaybackConfig;
  downloads: DownloadServiceConfig;
  queues: QueuesConfig;
  lyrics: LyricsConfig;
  cache: CacheConfig;
  watch: WatchConfig;
  lease: LeaseConfig;
  cleanup: CleanupConfig;
  eventLogCapacity: number;
  logging: LoggingConfig;
}
