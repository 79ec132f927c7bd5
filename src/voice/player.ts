import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../utils/logger.js';

/**
 * Plays a local audio file to completion
 */
export interface AudioPlayer {
  play(filePath: string): Promise<void>;
  /** Abort the current playback, if any */
  stop(): void;
}

export interface PlayerConfig {
  /** ALSA output device */
  device: string;
  /** 0-100 */
  volume: number;
  /** ffmpeg is killed when a playback runs longer than this */
  timeoutMs: number;
}

/**
 * Plays WAV assets on an ALSA device through ffmpeg.
 * The promise settles when ffmpeg has written the last sample.
 */
export class FfmpegPlayer implements AudioPlayer {
  private config: PlayerConfig;
  private current: ffmpeg.FfmpegCommand | null = null;

  constructor(config: PlayerConfig) {
    this.config = config;
  }

  play(filePath: string): Promise<void> {
    if (this.current) {
      return Promise.reject(new Error('Playback already in progress'));
    }

    return new Promise((resolve, reject) => {
      const gain = this.config.volume / 100;

      const command = ffmpeg(filePath, { timeout: Math.ceil(this.config.timeoutMs / 1000) })
        .audioFilters(`volume=${gain}`)
        .format('alsa')
        .on('error', (err: Error) => {
          this.current = null;
          logger.error(`Playback error for ${filePath}: ${err.message}`);
          reject(err);
        })
        .on('end', () => {
          this.current = null;
          logger.debug(`Playback finished: ${filePath}`);
          resolve();
        });

      this.current = command;
      logger.debug(`Playing ${filePath}`, { device: this.config.device, volume: this.config.volume });
      command.save(this.config.device);
    });
  }

  stop(): void {
    if (this.current) {
      this.current.kill('SIGTERM');
      logger.debug('Playback stopped');
    }
  }
}
