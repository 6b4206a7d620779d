import { promises as fsp } from 'fs';
import * as path from 'path';
import { Clock, epochSeconds } from './PresenceTracker';

export interface StreamStatus {
  isLive(streamKey: string): Promise<boolean>;
}

export interface HlsStreamStatusOptions {
  hlsDir: string;
  playlistLength: number; // seconds
  quality?: string;
  clock?: Clock;
}

/**
 * A stream is live while the media pipeline keeps rewriting its playlist:
 * `<hlsDir>/<key>[_<quality>].m3u8` must exist and be younger than the
 * playlist length.
 */
export class HlsStreamStatus implements StreamStatus {
  private hlsDir: string;
  private playlistLength: number;
  private quality?: string;
  private clock: Clock;

  constructor(options: HlsStreamStatusOptions) {
    this.hlsDir = options.hlsDir;
    this.playlistLength = options.playlistLength;
    this.quality = options.quality;
    this.clock = options.clock ?? epochSeconds;
  }

  playlistPath(streamKey: string): string {
    const filename = this.quality ? `${streamKey}_${this.quality}.m3u8` : `${streamKey}.m3u8`;
    return path.join(this.hlsDir, filename);
  }

  async isLive(streamKey: string): Promise<boolean> {
    const modified = await this.modifiedAt(this.playlistPath(streamKey));
    if (modified === undefined) return false;
    return this.clock() - modified < this.playlistLength;
  }

  private async modifiedAt(file: string): Promise<number | undefined> {
    try {
      const stats = await fsp.stat(file);
      return stats.isFile() ? Math.floor(stats.mtimeMs / 1000) : undefined;
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
