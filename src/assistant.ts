import type { AssistantConfig } from './config.js';
import { logger, errorMessage } from './utils/logger.js';
import { validateWavAsset } from './utils/audio.js';
import { BoundedChannel } from './utils/channel.js';
import { PeripheralDriver } from './peripheral/index.js';
import { createKeywordEngine, type KeywordEngine } from './providers/wakeword/index.js';
import { createAudioSource, type AudioSource } from './providers/microphone/index.js';
import { createCameraProvider } from './providers/camera/index.js';
import { createClassifierProvider } from './providers/classifier/index.js';
import { FfmpegPlayer } from './voice/index.js';
import {
  AudioResponder,
  CaptureClassifyClient,
  KeywordDetectionProducer,
  TriggerOrchestrator,
  runPipeline,
  type DetectionEvent,
} from './services/index.js';

/**
 * Voice Sort Assistant
 * Keyword → photo → remote classification → spoken category
 */
export class VoiceSortAssistant {
  private config: AssistantConfig;
  private engine: KeywordEngine;
  private source: AudioSource;
  private channel: BoundedChannel<DetectionEvent>;
  private producer: KeywordDetectionProducer;
  private player: FfmpegPlayer;
  private peripheral: PeripheralDriver | null = null;
  private controller: AbortController | null = null;
  private loops: Promise<void> | null = null;

  constructor(config: AssistantConfig) {
    this.config = config;

    this.engine = createKeywordEngine(config);
    this.source = createAudioSource(config, this.engine.frameSamples);
    this.channel = new BoundedChannel<DetectionEvent>(config.audio.channelCapacity);
    this.producer = new KeywordDetectionProducer({
      engine: this.engine,
      source: this.source,
      channel: this.channel,
      keywords: config.keywords.entries,
    });
    this.player = new FfmpegPlayer({ ...config.playback });
  }

  /**
   * Validate assets, load models, open the bus and start both loops.
   * Rejects with a FatalError if any of that fails.
   */
  async start(): Promise<void> {
    if (this.loops) return;

    await this.validateAssets();
    await this.producer.initialize();

    const peripheral = await PeripheralDriver.open(this.config.peripheral);
    this.peripheral = peripheral;
    await peripheral.clearResult();

    const responder = new AudioResponder(this.config.categories, this.config.events, this.player, peripheral);
    for (const event of responder.missingEvents()) {
      if (event !== 'ack') {
        logger.warn(`No asset for "${event}": that failure will only be logged, not heard`);
      }
    }

    const client = new CaptureClassifyClient(createCameraProvider(this.config), createClassifierProvider(this.config));
    const orchestrator = new TriggerOrchestrator({
      channel: this.channel,
      gate: this.producer,
      client,
      responder,
      diagnostics: peripheral,
      timing: this.config.trigger,
    });

    const controller = new AbortController();
    this.controller = controller;

    await this.source.start();
    this.loops = runPipeline(this.producer, orchestrator, controller);

    logger.info('Voice sort assistant ready', {
      keywords: this.config.keywords.entries.map((k) => k.name),
      categories: Object.keys(this.config.categories).length,
    });
  }

  /**
   * Resolves when both loops have stopped; rejects with the first fatal error
   */
  async wait(): Promise<void> {
    await this.loops;
  }

  /**
   * Stop both loops and release devices
   */
  async stop(): Promise<void> {
    logger.info('Shutting down...');

    this.controller?.abort();
    this.player.stop();
    await this.source.stop();

    try {
      await this.loops;
    } catch (error) {
      logger.debug(`Loops ended with: ${errorMessage(error)}`);
    }

    await this.engine.dispose();
    await this.peripheral?.close();
    this.peripheral = null;
    this.loops = null;

    logger.info('Shutdown complete');
  }

  private async validateAssets(): Promise<void> {
    const assets = new Set<string>();
    for (const entry of Object.values(this.config.categories)) {
      if (entry.asset) assets.add(entry.asset);
    }
    for (const asset of Object.values(this.config.events)) {
      if (asset) assets.add(asset);
    }

    for (const asset of assets) {
      await validateWavAsset(asset);
    }
    logger.info(`Validated ${assets.size} audio asset(s)`);
  }
}
