import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 7080,
    host: '0.0.0.0',
    env: 'development',
  },
  paths: {
    inboxRoot: '/inbox',
    libraryRoot: '/music/library',
    albumsFile: '/data/albums.json',
    recentAlbumsFile: '/data/recent_albums.json',
    playlistDir: '/data/playlist',
    leaseRecordFile: '/tmp/tagger_import.lock',
  },
  tagger: {
    command: 'beet',
    configFile: '/config/config.yaml',
  },
  catalog: {
    regenerateCommand: ['/app/bin/regenerate-albums'],
  },
  playback: {
    command: 'mpc',
    host: '127.0.0.1',
    port: 6600,
    uriPrefix: 'NAS/MUSIC/',
  },
  downloads: {
    baseUrl: 'http://127.0.0.1:5030',
    searchWaitMs: 3000,
    timeoutMs: 30000,
  },
  queues: {
    inbox: {
      debouncePolicy: 'settling-timer',
      debounceMs: 60000,
      actionTimeoutMs: 0, // imports may legitimately run for hours
    },
    library: {
      debouncePolicy: 'fixed-delay',
      debounceMs: 30000,
      actionTimeoutMs: 1800000, // 30 minutes
    },
    cover: {
      debouncePolicy: 'fixed-delay',
      debounceMs: 30000,
      actionTimeoutMs: 300000, // 5 minutes
    },
    lyrics: {
      debouncePolicy: 'fixed-delay',
      debounceMs: 10000,
      actionTimeoutMs: 60000,
    },
    popTimeoutMs: 1000,
  },
  lyrics: {
    rateLimit: 10,
    windowMs: 60000,
    cooldownMs: 60000,
    maxRetries: 3,
    autoQueue: true,
  },
  cache: {
    inboxStatsTtlMs: 60000,
    libraryStatsTtlMs: 300000,
  },
  watch: {
    inboxIgnore: ['_UNPACK_'],
    libraryIgnore: ['.beets'],
  },
  lease: {
    backend: 'socket',
    key: 'library-conductor-import',
  },
  cleanup: {
    enabled: true,
    schedule: '*/30 * * * *',
  },
  eventLogCapacity: 100,
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
