/**
 * Socket-backed cross-process lease.
 *
 * Holding the lease means listening on a Unix socket named after the
 * key. The kernel allows one listener per address and drops it when the
 * process exits, however it exits. On Linux the socket lives in the
 * abstract namespace and leaves nothing on disk; elsewhere a socket file
 * is used and a leftover file from a dead holder is detected by a
 * refused connection and removed.
 *
 * A JSON record `{ holderPid, acquiredAt }` is written next to it for
 * operators. It is never read back to decide anything.
 */

import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { PollingLease } from './ExclusiveLease.js';
import { logger } from '../../middleware/logging.js';
import { getErrorCode, getErrorMessage } from '../../utils/errorHandling.js';

export interface LeaseRecord {
  holderPid: number;
  acquiredAt: string;
}

export function leaseAddress(key: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'linux'
    ? `\0${key}`
    : path.join(os.tmpdir(), `${key}.sock`);
}

export class SocketLease extends PollingLease {
  private server: net.Server | null = null;
  readonly address: string;

  constructor(key: string, private readonly recordFile?: string, platform: NodeJS.Platform = process.platform) {
    super(key);
    this.address = leaseAddress(key, platform);
  }

  protected async attempt(): Promise<boolean> {
    const result = await this.listen();
    if (result === 'stale') {
      // Leftover socket file from a dead holder
      await fs.remove(this.address);
      return (await this.listen()) === 'acquired';
    }
    if (result === 'acquired') {
      await this.writeRecord();
      return true;
    }
    return false;
  }

  protected async relinquish(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
    if (this.recordFile) {
      await fs.remove(this.recordFile).catch((error: unknown) => {
        logger.warn('[SocketLease] Failed to remove lease record', {
          service: 'SocketLease',
          operation: 'release',
          key: this.key,
          error: getErrorMessage(error),
        });
      });
    }
  }

  private listen(): Promise<'acquired' | 'held' | 'stale'> {
    return new Promise((resolve, reject) => {
      const server = net.createServer(socket => socket.destroy());

      server.once('error', error => {
        if (getErrorCode(error) !== 'EADDRINUSE') {
          reject(error);
          return;
        }
        if (this.address.startsWith('\0')) {
          resolve('held');
          return;
        }
        this.isListening().then(alive => resolve(alive ? 'held' : 'stale'), reject);
      });

      server.listen(this.address, () => {
        // The lease must never keep the process alive on its own
        server.unref();
        this.server = server;
        resolve('acquired');
      });
    });
  }

  /**
   * Whether something still accepts connections on the socket file
   */
  private isListening(): Promise<boolean> {
    return new Promise(resolve => {
      const socket = net.connect(this.address);
      socket.once('connect', () => {
        socket.destroy();
        resolve(true);
      });
      socket.once('error', error => {
        socket.destroy();
        const code = getErrorCode(error);
        resolve(code !== 'ECONNREFUSED' && code !== 'ENOENT');
      });
    });
  }

  private async writeRecord(): Promise<void> {
    if (!this.recordFile) {
      return;
    }
    const record: LeaseRecord = {
      holderPid: process.pid,
      acquiredAt: new Date().toISOString(),
    };
    try {
      await fs.outputJson(this.recordFile, record, { spaces: 2 });
    } catch (error) {
      logger.warn('[SocketLease] Failed to write lease record', {
        service: 'SocketLease',
        operation: 'acquire',
        key: this.key,
        recordFile: this.recordFile,
        error: getErrorMessage(error),
      });
    }
  }
}
