/**
 * LyricsScanService tests: library sweep into the lyrics queue
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { LyricsScanService } from '../../src/services/lyrics/LyricsScanService.js';
import { OrchestratorContext } from '../../src/services/orchestrator/OrchestratorContext.js';
import { createTestConfig } from '../utils/testConfig.js';
import { createTestContext } from '../utils/testContext.js';

describe('LyricsScanService', () => {
  let tmpDir: string;
  let library: string;
  let context: OrchestratorContext;
  let scanner: LyricsScanService;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lyrics-scan-'));
    library = path.join(tmpDir, 'library');
    context = createTestContext(createTestConfig(tmpDir));
    scanner = new LyricsScanService(library, context.channels.lyrics, context.eventLog, filePath =>
      Promise.resolve(path.basename(filePath) === 'a.flac')
    );

    await fs.outputFile(path.join(library, 'Artist', 'Album', 'a.flac'), 'audio');
    await fs.outputFile(path.join(library, 'Artist', 'Album', 'b.mp3'), 'audio');
    await fs.outputFile(path.join(library, 'Artist', 'Album', 'notes.txt'), 'text');
    await fs.outputFile(path.join(library, 'Artist', '.trash', 'c.flac'), 'audio');
    await fs.outputFile(path.join(library, 'Other', 'Disc 1', 'd.flac'), 'audio');
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('queues tracks without lyrics at scan priority', async () => {
    const result = await scanner.scan();

    expect(result).toEqual({ scanned: 3, queued: 2 });
    expect(context.channels.lyrics.queue.snapshot().map(item => [path.relative(library, item.target), item.priority])).toEqual([
      [path.join('Artist', 'Album', 'b.mp3'), 2],
      [path.join('Other', 'Disc 1', 'd.flac'), 2],
    ]);
    expect(context.eventLog.tail().map(entry => entry.message)).toEqual([
      'Starting library-wide lyrics scan',
      'Lyrics scan complete: 2 tracks queued',
    ]);
  });

  it('does not count tracks that are already pending', async () => {
    context.channels.lyrics.submit(path.join(library, 'Other', 'Disc 1', 'd.flac'), { priority: 1 });

    const result = await scanner.scan();

    expect(result).toEqual({ scanned: 3, queued: 1 });
    expect(context.channels.lyrics.queue.size()).toBe(2);
  });

  it('refuses a second concurrent scan', async () => {
    const first = scanner.scan();

    expect(scanner.isRunning()).toBe(true);
    expect(await scanner.scan()).toBeNull();
    await first;
    expect(scanner.isRunning()).toBe(false);
  });

  it('reports a missing library as a failed scan', async () => {
    await fs.remove(library);

    await expect(scanner.scan()).rejects.toThrow('ENOENT');
    expect(context.eventLog.tail().at(-1)?.level).toBe('error');
    expect(scanner.isRunning()).toBe(false);
  });
});
