import { spawn, type ChildProcess } from 'node:child_process';
import { logger } from '../../utils/logger.js';
import { FatalError } from '../../utils/errors.js';
import { PcmFrameBuffer } from './frame-buffer.js';
import type { AudioSource, MicrophoneConfig } from './interface.js';

/**
 * Captures raw PCM from an ALSA device through an ffmpeg child process.
 *
 * ffmpeg keeps writing whether or not anyone reads, so a reader that stops
 * calling readFrame() fills the backlog and the source fails with an overrun.
 */
export class FfmpegMicrophone implements AudioSource {
  readonly name = 'ffmpeg-alsa';
  readonly frameBytes: number;

  private config: MicrophoneConfig;
  private process: ChildProcess | null = null;
  private frames: PcmFrameBuffer;
  private ended = false;
  private failure: Error | null = null;
  private notify: (() => void) | null = null;

  constructor(config: MicrophoneConfig) {
    this.config = config;
    this.frameBytes = config.frameBytes;
    this.frames = new PcmFrameBuffer(config.frameBytes, config.maxBufferedFrames);
  }

  async start(): Promise<void> {
    if (this.process) return;

    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'alsa',
      '-ac', '1',
      '-ar', String(this.config.sampleRate),
      '-i', this.config.device,
      '-f', 's16le',
      '-acodec', 'pcm_s16le',
      '-',
    ];

    logger.debug(`Starting microphone: ffmpeg ${args.join(' ')}`);

    this.ended = false;
    this.failure = null;
    this.frames.clear();

    const proc = spawn('ffmpeg', args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.process = proc;

    let stderr = '';
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.stdout?.on('data', (chunk: Buffer) => {
      if (!this.frames.push(chunk)) {
        this.fail(
          new FatalError(
            `Audio buffer overrun: more than ${this.config.maxBufferedFrames} frames unread`,
            'AUDIO_OVERRUN',
          ),
        );
        proc.kill('SIGTERM');
      }
      this.wake();
    });

    proc.on('error', (error) => {
      this.fail(new FatalError(`Microphone capture failed: ${error.message}`, 'AUDIO_SOURCE_FAILED'));
    });

    proc.on('close', (code) => {
      if (this.process === proc) {
        this.process = null;
      }
      if (code !== 0 && code !== null && !this.failure) {
        this.fail(
          new FatalError(`ffmpeg microphone exited with code ${code}: ${stderr.trim()}`, 'AUDIO_SOURCE_FAILED'),
        );
      }
      this.ended = true;
      this.wake();
    });

    logger.info(`Microphone started on ${this.config.device} at ${this.config.sampleRate} Hz`);
  }

  async readFrame(signal?: AbortSignal): Promise<Buffer | null> {
    for (;;) {
      if (this.failure) throw this.failure;

      const frame = this.frames.take();
      if (frame) return frame;

      if (this.ended || signal?.aborted) return null;

      await new Promise<void>((resolve) => {
        const done = () => {
          signal?.removeEventListener('abort', done);
          this.notify = null;
          resolve();
        };
        this.notify = done;
        signal?.addEventListener('abort', done, { once: true });
      });
    }
  }

  async stop(): Promise<void> {
    const proc = this.process;
    if (!proc) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        resolve();
      }, 2000);

      proc.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      proc.kill('SIGTERM');
    });

    this.process = null;
    this.frames.clear();
    logger.info('Microphone stopped');
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
      logger.error(error.message);
    }
    this.wake();
  }

  private wake(): void {
    this.notify?.();
  }
}
