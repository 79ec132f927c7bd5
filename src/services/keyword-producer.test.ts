import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../utils/channel.js';
import { FatalError } from '../utils/errors.js';
import type { KeywordEngine, ProbabilityCallback } from '../providers/wakeword/index.js';
import type { AudioSource } from '../providers/microphone/index.js';
import { KeywordDetectionProducer, type DetectionEvent } from './keyword-producer.js';

type Step = readonly number[] | 'error';

class ScriptedEngine implements KeywordEngine {
  readonly name = 'scripted';
  readonly keywords = ['start', 'stop'];
  readonly frameSamples = 4;
  processed = 0;
  failInit = false;
  modelsPresent = true;
  private callback: ProbabilityCallback | null = null;

  constructor(private readonly steps: Step[] = []) {}

  async initialize(): Promise<void> {
    if (this.failInit) throw new Error('model file missing');
  }

  onProbabilities(callback: ProbabilityCallback): void {
    this.callback = callback;
  }

  /** Invoke the callback as if an inference step had produced `probabilities` */
  emit(probabilities: readonly number[]): void {
    this.callback?.(probabilities);
  }

  async process(_frame: Buffer): Promise<void> {
    const step = this.steps[this.processed++];
    if (step === 'error') throw new Error('inference failed');
    if (step) this.emit(step);
  }

  async dispose(): Promise<void> {}

  async isAvailable(): Promise<boolean> {
    return this.modelsPresent;
  }
}

class QueueSource implements AudioSource {
  readonly name = 'queue';
  readonly frameBytes = 8;
  failure: Error | null = null;

  constructor(private frames: number) {}

  async start(): Promise<void> {}

  async readFrame(signal?: AbortSignal): Promise<Buffer | null> {
    if (this.failure) throw this.failure;
    if (signal?.aborted || this.frames <= 0) return null;
    this.frames--;
    return Buffer.alloc(this.frameBytes);
  }

  async stop(): Promise<void> {}
}

const keywords = [
  { name: 'start', threshold: 0.5 },
  { name: 'stop', threshold: 0.8 },
];

function setup(steps: Step[] = [], capacity = 10) {
  let clock = 1000;
  const engine = new ScriptedEngine(steps);
  const source = new QueueSource(steps.length);
  const channel = new BoundedChannel<DetectionEvent>(capacity);
  const producer = new KeywordDetectionProducer({
    engine,
    source,
    channel,
    keywords,
    now: () => clock++,
  });
  return { engine, source, channel, producer };
}

describe('KeywordDetectionProducer', () => {
  it('emits an event only for probabilities strictly above the threshold', async () => {
    const { channel, producer } = setup([
      [0.5, 0.1],
      [0.51, 0.9],
    ]);

    await producer.run(new AbortController().signal);

    expect(channel.drain()).toEqual([
      { keywordIndex: 0, keyword: 'start', timestamp: 1000 },
      { keywordIndex: 1, keyword: 'stop', timestamp: 1001 },
    ]);
  });

  it('ignores probabilities for keywords it was not configured with', () => {
    const { engine, channel } = setup();

    engine.emit([0.1, 0.1, 0.99]);

    expect(channel.size).toBe(0);
  });

  it('emits nothing while paused', () => {
    const { engine, channel, producer } = setup();

    producer.pause();
    engine.emit([0.9, 0.9]);

    expect(producer.isPaused).toBe(true);
    expect(channel.size).toBe(0);
  });

  it('discards queued events on pause and on resume', () => {
    const { engine, channel, producer } = setup();

    engine.emit([0.9, 0]);
    producer.pause();
    expect(channel.size).toBe(0);

    // Something slipped in between pause and resume
    channel.tryPush({ keywordIndex: 0, keyword: 'start', timestamp: 1 });
    producer.resume();

    expect(channel.size).toBe(0);
    expect(producer.isPaused).toBe(false);

    engine.emit([0.9, 0]);
    expect(channel.size).toBe(1);
  });

  it('drops the newest event when the channel is full and keeps the queued ones', () => {
    const { engine, channel, producer } = setup([], 2);

    engine.emit([0.9, 0]);
    engine.emit([0.9, 0]);
    engine.emit([0.9, 0]);

    expect(channel.drain().map((e) => e.timestamp)).toEqual([1000, 1001]);
    expect(producer.droppedEvents).toBe(1);
  });

  it('skips a failed inference step and keeps reading', async () => {
    const { engine, channel, producer } = setup(['error', [0.9, 0]]);

    await producer.run(new AbortController().signal);

    expect(engine.processed).toBe(2);
    expect(channel.size).toBe(1);
  });

  it('stops when the signal is aborted', async () => {
    const { engine, producer } = setup([[0], [0], [0]]);
    const controller = new AbortController();
    controller.abort();

    await producer.run(controller.signal);

    expect(engine.processed).toBe(0);
  });

  it('reports an engine that cannot initialize as fatal', async () => {
    const { engine, producer } = setup();
    engine.failInit = true;

    const failure = producer.initialize();
    await expect(failure).rejects.toBeInstanceOf(FatalError);
    await expect(failure).rejects.toMatchObject({ code: 'ENGINE_INIT_FAILED' });
  });

  it('refuses to initialize when model files are missing', async () => {
    const { engine, producer } = setup();
    engine.modelsPresent = false;

    await expect(producer.initialize()).rejects.toThrow('Keyword engine scripted is missing model files');
  });

  it('reports a failing audio source as fatal', async () => {
    const { source, producer } = setup([[0]]);
    source.failure = new Error('device gone');

    await expect(producer.run(new AbortController().signal)).rejects.toMatchObject({
      name: 'FatalError',
      code: 'AUDIO_SOURCE_FAILED',
    });
  });
});
