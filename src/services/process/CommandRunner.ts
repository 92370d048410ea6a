/**
 * External Command Runner
 *
 * Every Action reaches the outside world through this interface: the
 * tagger, the catalog regeneration script and the playback client.
 * Tests substitute an in-process fake.
 */

import { spawn } from 'child_process';
import { ProcessError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

export interface CommandResult {
  /** null when the child was killed by a signal */
  exitCode: number | null;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface RunOptions {
  /** 0 or undefined: no timeout */
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /**
   * Resolves for any exit status. Rejects with ProcessError only when the
   * command cannot be started at all.
   */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 5000;

/** Captured output beyond this is truncated from the front */
const MAX_OUTPUT_CHARS = 1024 * 1024;

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let output = '';
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;
      let timeoutTimer: NodeJS.Timeout | undefined;

      const append = (chunk: Buffer): void => {
        output += chunk.toString('utf8');
        if (output.length > MAX_OUTPUT_CHARS) {
          output = output.slice(-MAX_OUTPUT_CHARS);
        }
      };
      child.stdout.on('data', append);
      child.stderr.on('data', append);

      if (options.timeoutMs && options.timeoutMs > 0) {
        timeoutTimer = setTimeout(() => {
          timedOut = true;
          logger.warn('[CommandRunner] Command timed out, terminating', {
            service: 'CommandRunner',
            operation: 'run',
            command,
            timeoutMs: options.timeoutMs,
          });
          child.kill('SIGTERM');
          killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
          killTimer.unref();
        }, options.timeoutMs);
      }

      const clearTimers = (): void => {
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
      };

      child.once('error', error => {
        clearTimers();
        reject(
          new ProcessError(
            command,
            -1,
            `Failed to start '${command}': ${error.message}`,
            { service: 'CommandRunner', operation: 'run' },
            error
          )
        );
      });

      child.once('close', exitCode => {
        clearTimers();
        const durationMs = Date.now() - startTime;

        logger.debug('[CommandRunner] Command finished', {
          service: 'CommandRunner',
          operation: 'run',
          command,
          args,
          exitCode,
          timedOut,
          durationMs,
        });

        resolve({ exitCode, output, timedOut, durationMs });
      });
    });
  }
}

/**
 * Short human-readable tail of captured output, for log lines and
 * API error messages
 */
export function outputExcerpt(output: string, maxChars = 500): string {
  const trimmed = output.trim();
  return trimmed.length > maxChars ? `...${trimmed.slice(-maxChars)}` : trimmed;
}
