/**
 * Configuration loading from the environment, and cross-field validation
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ConfigManager, validateConfig } from '../../src/config/ConfigManager.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { ConfigurationError } from '../../src/errors/index.js';

const TOUCHED = [
  'PORT',
  'NODE_ENV',
  'INBOX_PATH',
  'REGEN_COMMAND',
  'INBOX_DEBOUNCE_POLICY',
  'INBOX_DEBOUNCE_MS',
  'LYRICS_TIMEOUT_MS',
  'LYRICS_RATE_LIMIT',
  'LYRICS_AUTO_QUEUE',
  'INBOX_IGNORE',
  'LEASE_BACKEND',
  'DOWNLOAD_SERVICE_API_KEY',
];

describe('ConfigManager', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of TOUCHED) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of TOUCHED) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    ConfigManager.getInstance().reload();
  });

  it('falls back to defaults without touching them', () => {
    const manager = ConfigManager.getInstance();
    manager.reload();
    const config = manager.getConfig();

    expect(config.queues.inbox).toEqual(defaultConfig.queues.inbox);
    expect(config.lyrics.maxRetries).toBe(3);
    expect(config).not.toBe(defaultConfig);
    expect(config.watch.inboxIgnore).not.toBe(defaultConfig.watch.inboxIgnore);
  });

  it('reads typed values from the environment', () => {
    process.env.PORT = '9000';
    process.env.INBOX_PATH = '/srv/inbox';
    process.env.REGEN_COMMAND = 'node  /app/regen.js --all';
    process.env.INBOX_DEBOUNCE_POLICY = 'fixed-delay';
    process.env.INBOX_DEBOUNCE_MS = '5000';
    process.env.LYRICS_TIMEOUT_MS = '15000';
    process.env.LYRICS_AUTO_QUEUE = 'false';
    process.env.INBOX_IGNORE = '_UNPACK_, .partial ,';
    process.env.LEASE_BACKEND = 'memory';
    process.env.DOWNLOAD_SERVICE_API_KEY = 'test-secret';

    const manager = ConfigManager.getInstance();
    manager.reload();
    const config = manager.getConfig();

    expect(config.server.port).toBe(9000);
    expect(config.paths.inboxRoot).toBe('/srv/inbox');
    expect(config.catalog.regenerateCommand).toEqual(['node', '/app/regen.js', '--all']);
    expect(config.queues.inbox).toEqual({
      debouncePolicy: 'fixed-delay',
      debounceMs: 5000,
      actionTimeoutMs: 0,
    });
    expect(config.queues.lyrics.actionTimeoutMs).toBe(15000);
    expect(config.lyrics.autoQueue).toBe(false);
    expect(config.watch.inboxIgnore).toEqual(['_UNPACK_', '.partial']);
    expect(config.lease.backend).toBe('memory');
    expect(config.downloads.apiKey).toBe('test-secret');
  });

  it('rejects a non-numeric number', () => {
    process.env.LYRICS_RATE_LIMIT = 'ten';

    expect(() => ConfigManager.getInstance().reload()).toThrow(
      'Environment variable LYRICS_RATE_LIMIT must be a valid number'
    );
  });

  it('rejects an unknown enum value', () => {
    process.env.INBOX_DEBOUNCE_POLICY = 'sometimes';

    expect(() => ConfigManager.getInstance().reload()).toThrow(
      'Environment variable INBOX_DEBOUNCE_POLICY must be one of: fixed-delay, settling-timer'
    );
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(structuredClone(defaultConfig))).not.toThrow();
  });

  it('collects every cross-field problem into one error', () => {
    const config = structuredClone(defaultConfig);
    config.queues.cover.debounceMs = -1;
    config.lyrics.maxRetries = 0;
    config.catalog.regenerateCommand = [];

    let caught: unknown;
    try {
      validateConfig(config);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof Error ? caught.message : '').toBe(
      [
        'Configuration validation failed:',
        'Debounce window for cover must not be negative',
        'Lyrics max retries must be at least 1',
        'Catalog regeneration command is required',
      ].join('\n')
    );
  });
});
