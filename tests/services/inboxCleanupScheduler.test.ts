/**
 * InboxCleanupScheduler tests against a temporary inbox
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { InboxCleanupScheduler } from '../../src/services/schedulers/InboxCleanupScheduler.js';
import { EventLog } from '../../src/services/eventLog/EventLog.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('InboxCleanupScheduler', () => {
  let tmpDir: string;
  let inbox: string;
  let eventLog: EventLog;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cleanup-'));
    inbox = path.join(tmpDir, 'inbox');
    eventLog = new EventLog(20);
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  function scheduler(schedule = '*/30 * * * *', enabled = true): InboxCleanupScheduler {
    return new InboxCleanupScheduler(inbox, { enabled, schedule }, eventLog);
  }

  it('removes audio-free trees and empty leftovers inside album trees', async () => {
    await fs.outputFile(path.join(inbox, 'Artist', 'Album', '01.flac'), 'audio');
    await fs.ensureDir(path.join(inbox, 'Artist', 'Album', 'Scans'));
    await fs.ensureDir(path.join(inbox, 'Artist', 'Empty', 'Nested'));
    await fs.outputFile(path.join(inbox, 'Junk', 'readme.txt'), 'text');
    await fs.ensureDir(path.join(inbox, '_UNPACK_Album'));
    await fs.ensureDir(path.join(inbox, '.staging'));
    await fs.outputFile(path.join(inbox, 'loose.txt'), 'text');

    const summary = await scheduler().runCleanup();

    expect(summary?.removedTrees).toEqual([path.join(inbox, 'Junk')]);
    expect([...(summary?.removedEmptyDirs ?? [])].sort()).toEqual([
      path.join(inbox, 'Artist', 'Album', 'Scans'),
      path.join(inbox, 'Artist', 'Empty'),
      path.join(inbox, 'Artist', 'Empty', 'Nested'),
    ]);
    expect((await fs.readdir(inbox)).sort()).toEqual(['.staging', 'Artist', '_UNPACK_Album', 'loose.txt']);
    expect(await fs.pathExists(path.join(inbox, 'Artist', 'Album', '01.flac'))).toBe(true);
    expect(eventLog.tail().map(entry => entry.message)).toContain('Removed inbox directory with no audio: Junk');
  });

  it('counts audio found in nested directories', async () => {
    await fs.outputFile(path.join(inbox, 'Box Set', 'CD1', '01.mp3'), 'audio');

    const summary = await scheduler().runCleanup();

    expect(summary).toEqual({ removedTrees: [], removedEmptyDirs: [] });
  });

  it('does nothing when the inbox is missing', async () => {
    expect(await scheduler().runCleanup()).toEqual({ removedTrees: [], removedEmptyDirs: [] });
  });

  it('skips a pass while another is running', async () => {
    await fs.ensureDir(inbox);
    const cleanup = scheduler();

    const [first, second] = await Promise.all([cleanup.runCleanup(), cleanup.runCleanup()]);

    expect(first).toEqual({ removedTrees: [], removedEmptyDirs: [] });
    expect(second).toBeNull();
  });

  it('rejects an invalid schedule on start', () => {
    expect(() => scheduler('not a schedule').start()).toThrow(ConfigurationError);
  });

  it('starts and stops a valid schedule', () => {
    const cleanup = scheduler();

    expect(() => cleanup.start()).not.toThrow();
    cleanup.stop();
  });

  it('stays idle when disabled', () => {
    expect(() => scheduler('not a schedule', false).start()).not.toThrow();
  });
});
