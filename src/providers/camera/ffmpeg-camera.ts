import ffmpeg from 'fluent-ffmpeg';
import { promises as fs, constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { logger } from '../../utils/logger.js';
import { CaptureError } from '../../utils/errors.js';
import type { CameraProvider, CameraConfig } from './interface.js';

/**
 * Grabs a single frame from a V4L2 device with ffmpeg
 */
export class FfmpegCamera implements CameraProvider {
  readonly name = 'ffmpeg-v4l2';
  private config: CameraConfig;

  constructor(config: CameraConfig) {
    this.config = config;
  }

  async capture(): Promise<string> {
    const { device, width, height, snapshotPath, timeoutMs } = this.config;

    try {
      await fs.access(device, fsConstants.R_OK);
    } catch {
      throw new CaptureError(`Camera device unavailable: ${device}`, 'CAMERA_UNAVAILABLE', { device });
    }

    await fs.mkdir(path.dirname(snapshotPath), { recursive: true });

    await new Promise<void>((resolve, reject) => {
      ffmpeg(device, { timeout: Math.ceil(timeoutMs / 1000) })
        .inputFormat('v4l2')
        .inputOptions([`-video_size ${width}x${height}`])
        .frames(1)
        .outputOptions(['-update 1', '-q:v 2'])
        .on('error', (err: Error) => {
          reject(new CaptureError(`Capture failed: ${err.message}`, 'CAPTURE_FAILED', { device }));
        })
        .on('end', () => resolve())
        .save(snapshotPath);
    });

    logger.debug(`Captured ${width}x${height} frame to ${snapshotPath}`);
    return snapshotPath;
  }
}
