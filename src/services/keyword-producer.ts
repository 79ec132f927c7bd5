import { logger, errorMessage } from '../utils/logger.js';
import { FatalError, isFatal } from '../utils/errors.js';
import type { BoundedChannel } from '../utils/channel.js';
import type { KeywordEngine } from '../providers/wakeword/index.js';
import type { AudioSource } from '../providers/microphone/index.js';
import type { KeywordEntry } from '../config.js';

export interface DetectionEvent {
  readonly keywordIndex: number;
  readonly keyword: string;
  /** Milliseconds, from the producer's clock */
  readonly timestamp: number;
}

/**
 * Suppression switch the orchestrator flips around its own audio output
 */
export interface DetectionGate {
  pause(): void;
  resume(): void;
}

export interface KeywordProducerOptions {
  engine: KeywordEngine;
  source: AudioSource;
  channel: BoundedChannel<DetectionEvent>;
  keywords: readonly KeywordEntry[];
  now?: () => number;
}

/**
 * Feeds microphone frames to the keyword engine and turns threshold
 * crossings into DetectionEvents.
 *
 * The loop must keep reading so the audio source never overruns; nothing in
 * here waits on the consumer. The probability callback only enqueues.
 */
export class KeywordDetectionProducer implements DetectionGate {
  private engine: KeywordEngine;
  private source: AudioSource;
  private channel: BoundedChannel<DetectionEvent>;
  private keywords: readonly KeywordEntry[];
  private now: () => number;
  private paused = false;
  private dropped = 0;

  constructor(options: KeywordProducerOptions) {
    this.engine = options.engine;
    this.source = options.source;
    this.channel = options.channel;
    this.keywords = options.keywords;
    this.now = options.now ?? Date.now;

    this.engine.onProbabilities((probabilities) => this.handleProbabilities(probabilities));
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Events dropped because the channel was full */
  get droppedEvents(): number {
    return this.dropped;
  }

  /**
   * Load the engine. Any failure here is fatal.
   */
  async initialize(): Promise<void> {
    if (!(await this.engine.isAvailable())) {
      throw new FatalError(`Keyword engine ${this.engine.name} is missing model files`, 'ENGINE_INIT_FAILED');
    }

    try {
      await this.engine.initialize();
    } catch (error) {
      throw new FatalError(`Keyword engine ${this.engine.name} failed to initialize: ${errorMessage(error)}`, 'ENGINE_INIT_FAILED');
    }
  }

  /**
   * Read and process frames until `signal` aborts or the source ends.
   * Rejects only on a fatal source failure.
   */
  async run(signal: AbortSignal): Promise<void> {
    logger.info(`Keyword detection started`, {
      keywords: this.keywords.map((k) => `${k.name}>${k.threshold}`),
    });

    while (!signal.aborted) {
      let frame: Buffer | null;
      try {
        frame = await this.source.readFrame(signal);
      } catch (error) {
        if (isFatal(error)) throw error;
        throw new FatalError(`Audio source ${this.source.name} failed: ${errorMessage(error)}`, 'AUDIO_SOURCE_FAILED');
      }

      if (!frame) break;

      try {
        await this.engine.process(frame);
      } catch (error) {
        logger.warn(`Inference step failed, skipping frame: ${errorMessage(error)}`);
      }
    }

    logger.info('Keyword detection stopped');
  }

  /**
   * Stop turning detections into events and discard any already queued
   */
  pause(): void {
    this.paused = true;
    this.discardQueued('pause');
  }

  /**
   * Discard anything queued while paused, then accept detections again
   */
  resume(): void {
    this.discardQueued('resume');
    this.paused = false;
  }

  private handleProbabilities(probabilities: readonly number[]): void {
    if (this.paused) return;

    const count = Math.min(probabilities.length, this.keywords.length);
    for (let i = 0; i < count; i++) {
      const { name, threshold } = this.keywords[i];
      const probability = probabilities[i];
      if (!(probability > threshold)) continue;

      const event: DetectionEvent = { keywordIndex: i, keyword: name, timestamp: this.now() };
      if (this.channel.tryPush(event)) {
        logger.debug(`Keyword "${name}" detected`, { probability: probability.toFixed(3), threshold });
      } else {
        this.dropped++;
        logger.debug(`Event channel full, dropped detection of "${name}"`);
      }
    }
  }

  private discardQueued(reason: string): void {
    const stale = this.channel.drain();
    if (stale.length > 0) {
      logger.debug(`Discarded ${stale.length} queued detection(s) on ${reason}`);
    }
  }
}
