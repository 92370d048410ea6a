/**
 * Tagger Client
 *
 * Thin wrapper building command lines for the external tagging tool.
 * The tool is opaque: we only read exit codes and text output.
 */

import { TaggerConfig } from '../../config/types.js';
import { CommandResult, CommandRunner } from '../process/CommandRunner.js';

export interface AlbumIdentity {
  albumArtist: string;
  album: string;
  releaseId: string | null;
}

export class TaggerClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: TaggerConfig
  ) {}

  /**
   * Run the tagger with its config file and the given arguments
   */
  run(args: readonly string[], timeoutMs?: number): Promise<CommandResult> {
    return this.runner.run(this.config.command, ['-c', this.config.configFile, ...args], {
      ...(timeoutMs !== undefined && { timeoutMs }),
    });
  }

  /**
   * Quiet, non-interactive import of a directory. No timeout: large
   * imports legitimately run for hours.
   */
  importDirectory(directory: string): Promise<CommandResult> {
    return this.run(['import', '-q', '-A', directory]);
  }

  /**
   * Force a lyrics fetch for one track
   */
  fetchLyrics(trackPath: string, timeoutMs: number): Promise<CommandResult> {
    return this.run(['lyrics', '-f', trackPath], timeoutMs);
  }

  /**
   * Album identity for a directory, from the tagger's library
   */
  async identifyAlbum(albumDir: string, timeoutMs: number): Promise<AlbumIdentity | null> {
    const result = await this.run(
      ['list', '-a', '-f', '$albumartist\t$album\t$mb_albumid', `path:${albumDir}`],
      timeoutMs
    );
    if (result.exitCode !== 0) {
      return null;
    }
    return parseAlbumIdentity(result.output);
  }
}

/**
 * First line carrying artist and album; the release id may be empty
 */
export function parseAlbumIdentity(output: string): AlbumIdentity | null {
  for (const line of output.split('\n')) {
    const [albumArtist = '', album = '', releaseId = ''] = line.trim().split('\t').map(part => part.trim());
    if (albumArtist && album) {
      return { albumArtist, album, releaseId: releaseId || null };
    }
  }
  return null;
}
