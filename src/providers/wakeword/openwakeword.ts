import * as ort from 'onnxruntime-node';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { logger, errorMessage } from '../../utils/logger.js';
import { pcmToFloat32, resample } from '../../utils/audio.js';
import type { KeywordEngine, KeywordEngineConfig, ProbabilityCallback } from './interface.js';

/** Audio frame size expected by OpenWakeWord (80ms at 16kHz) */
const FRAME_SIZE = 1280;
/** Target sample rate for OpenWakeWord models */
const TARGET_SAMPLE_RATE = 16000;
/** Number of mel frames per audio chunk */
const MEL_FRAMES_PER_CHUNK = 5;
/** Mel band count */
const MEL_BANDS = 32;
/** Mel window size for embedding model */
const MEL_WINDOW = 76;
/** Mel step size between inference windows */
const MEL_STEP = 8;
/** Embedding vector size */
const EMBEDDING_SIZE = 96;
/** Embedding window size for keyword models */
const EMBEDDING_WINDOW = 16;
/** VAD hidden state size */
const VAD_HIDDEN_SIZE = 128;
/** VAD hidden state shape */
const VAD_HIDDEN_SHAPE = [2, 1, 64];
/** Silero speech probability above which a chunk counts as voiced */
const VAD_THRESHOLD = 0.5;

const CORE_MODELS = ['melspectrogram.onnx', 'embedding_model.onnx', 'silero_vad.onnx'];

interface KeywordModelState {
  keyword: string;
  session: ort.InferenceSession;
  history: Float32Array[];
}

interface Sessions {
  melspec: ort.InferenceSession;
  embedding: ort.InferenceSession;
  vad: ort.InferenceSession;
  keywords: KeywordModelState[];
}

/**
 * Read the float payload of a named model output
 */
function floatOutput(results: ort.InferenceSession.OnnxValueMapType, name: string): Float32Array {
  const data = results[name]?.data;
  if (!(data instanceof Float32Array)) {
    throw new Error(`Model output ${name} is not float32`);
  }
  return data;
}

/**
 * OpenWakeWord keyword engine using ONNX Runtime.
 *
 * Pipeline per 80 ms chunk:
 * 1. Audio → melspectrogram model → mel features
 * 2. Mel features → embedding model → speech embeddings (every MEL_STEP frames)
 * 3. Speech embeddings → one keyword model per keyword → probabilities
 * 4. Silero VAD gates the probabilities so silence and noise report 0
 *
 * Each embedding step is one inference step and yields one callback.
 */
export class OpenWakeWordEngine implements KeywordEngine {
  readonly name = 'openwakeword';
  readonly keywords: readonly string[];
  readonly frameSamples: number;

  private config: KeywordEngineConfig;
  private sessions: Sessions | null = null;
  private callback: ProbabilityCallback | null = null;

  // Processing state
  private melBuffer: Float32Array[] = [];
  private vadH: ort.Tensor | null = null;
  private vadC: ort.Tensor | null = null;

  constructor(config: KeywordEngineConfig) {
    this.config = config;
    this.keywords = [...config.keywords];
    this.frameSamples = Math.round((FRAME_SIZE * config.sampleRate) / TARGET_SAMPLE_RATE);
  }

  async initialize(): Promise<void> {
    if (this.sessions) return;

    const modelDir = this.config.modelPath;
    logger.info(`Loading OpenWakeWord models from ${modelDir}`);

    const sessionOptions: ort.InferenceSession.SessionOptions = {
      executionProviders: ['cpu'],
    };

    const melspec = await ort.InferenceSession.create(path.join(modelDir, 'melspectrogram.onnx'), sessionOptions);
    logger.debug('Loaded melspectrogram model');

    const embedding = await ort.InferenceSession.create(path.join(modelDir, 'embedding_model.onnx'), sessionOptions);
    logger.debug('Loaded embedding model');

    const vad = await ort.InferenceSession.create(path.join(modelDir, 'silero_vad.onnx'), sessionOptions);
    logger.debug('Loaded VAD model');

    const keywords: KeywordModelState[] = [];
    for (const keyword of this.keywords) {
      const modelPath = path.join(modelDir, this.resolveKeywordModel(keyword));

      try {
        await fs.access(modelPath);
      } catch {
        throw new Error(`Keyword model not found: ${modelPath}`);
      }

      const session = await ort.InferenceSession.create(modelPath, sessionOptions);
      const history: Float32Array[] = [];
      for (let i = 0; i < EMBEDDING_WINDOW; i++) {
        history.push(new Float32Array(EMBEDDING_SIZE));
      }

      keywords.push({ keyword, session, history });
      logger.debug(`Loaded keyword model: ${keyword}`, { modelPath });
    }

    this.sessions = { melspec, embedding, vad, keywords };
    this.resetState();
    logger.info(`OpenWakeWord initialized with keywords: ${this.keywords.join(', ')}`);
  }

  onProbabilities(callback: ProbabilityCallback): void {
    this.callback = callback;
  }

  async process(frame: Buffer): Promise<void> {
    if (!this.sessions) {
      throw new Error('OpenWakeWord not initialized. Call initialize() first.');
    }

    const samples = resample(pcmToFloat32(frame), this.config.sampleRate, TARGET_SAMPLE_RATE);

    for (let offset = 0; offset + FRAME_SIZE <= samples.length; offset += FRAME_SIZE) {
      await this.processChunk(this.sessions, samples.subarray(offset, offset + FRAME_SIZE));
    }
  }

  async dispose(): Promise<void> {
    const sessions = this.sessions;
    if (!sessions) return;
    this.sessions = null;

    await sessions.melspec.release();
    await sessions.embedding.release();
    await sessions.vad.release();
    for (const state of sessions.keywords) {
      await state.session.release();
    }
    logger.info('OpenWakeWord disposed');
  }

  async isAvailable(): Promise<boolean> {
    try {
      const modelDir = this.config.modelPath;
      for (const file of [...CORE_MODELS, ...this.keywords.map((k) => this.resolveKeywordModel(k))]) {
        await fs.access(path.join(modelDir, file));
      }
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Process a single audio chunk (1280 samples at 16kHz = 80ms)
   */
  private async processChunk(sessions: Sessions, chunk: Float32Array): Promise<void> {
    const vadActive = await this.runVad(sessions.vad, chunk);

    const melspecTensor = new ort.Tensor('float32', chunk, [1, FRAME_SIZE]);
    const melspecResults = await sessions.melspec.run({
      [sessions.melspec.inputNames[0]]: melspecTensor,
    });
    const newMelData = new Float32Array(floatOutput(melspecResults, sessions.melspec.outputNames[0]));

    // Same scaling the reference models were trained with
    for (let j = 0; j < newMelData.length; j++) {
      newMelData[j] = newMelData[j] / 10.0 + 2.0;
    }

    for (let j = 0; j < MEL_FRAMES_PER_CHUNK; j++) {
      this.melBuffer.push(new Float32Array(newMelData.subarray(j * MEL_BANDS, (j + 1) * MEL_BANDS)));
    }

    while (this.melBuffer.length >= MEL_WINDOW) {
      const flattenedMel = new Float32Array(MEL_WINDOW * MEL_BANDS);
      for (let j = 0; j < MEL_WINDOW; j++) {
        flattenedMel.set(this.melBuffer[j], j * MEL_BANDS);
      }

      const embeddingInput = new ort.Tensor('float32', flattenedMel, [1, MEL_WINDOW, MEL_BANDS, 1]);
      const embeddingOut = await sessions.embedding.run({
        [sessions.embedding.inputNames[0]]: embeddingInput,
      });
      const newEmbedding = new Float32Array(floatOutput(embeddingOut, sessions.embedding.outputNames[0]));

      const probabilities: number[] = [];
      for (const state of sessions.keywords) {
        state.history.shift();
        state.history.push(newEmbedding);

        const flattenedEmbeddings = new Float32Array(EMBEDDING_WINDOW * EMBEDDING_SIZE);
        for (let j = 0; j < state.history.length; j++) {
          flattenedEmbeddings.set(state.history[j], j * EMBEDDING_SIZE);
        }

        const finalInput = new ort.Tensor('float32', flattenedEmbeddings, [1, EMBEDDING_WINDOW, EMBEDDING_SIZE]);
        const results = await state.session.run({
          [state.session.inputNames[0]]: finalInput,
        });
        const score = floatOutput(results, state.session.outputNames[0])[0];

        probabilities.push(vadActive ? score : 0);
      }

      this.callback?.(probabilities);

      // Advance mel buffer by MEL_STEP frames
      this.melBuffer.splice(0, MEL_STEP);
    }
  }

  /**
   * Run Silero VAD on audio chunk
   */
  private async runVad(vad: ort.InferenceSession, chunk: Float32Array): Promise<boolean> {
    if (!this.vadH || !this.vadC) return true;

    try {
      const result = await vad.run({
        input: new ort.Tensor('float32', chunk, [1, chunk.length]),
        sr: new ort.Tensor('int64', BigInt64Array.from([BigInt(TARGET_SAMPLE_RATE)]), []),
        h: this.vadH,
        c: this.vadC,
      });

      this.vadH = result.hn;
      this.vadC = result.cn;

      return floatOutput(result, 'output')[0] > VAD_THRESHOLD;
    } catch (err) {
      logger.debug(`VAD error: ${errorMessage(err)}`);
      return true; // Default to active if VAD fails
    }
  }

  /**
   * Reset all internal state buffers
   */
  private resetState(): void {
    this.melBuffer = [];
    this.vadH = new ort.Tensor('float32', new Float32Array(VAD_HIDDEN_SIZE), VAD_HIDDEN_SHAPE);
    this.vadC = new ort.Tensor('float32', new Float32Array(VAD_HIDDEN_SIZE), VAD_HIDDEN_SHAPE);

    for (const state of this.sessions?.keywords ?? []) {
      for (const embedding of state.history) {
        embedding.fill(0);
      }
    }
  }

  /**
   * Resolve keyword name to model filename.
   * Names containing a path separator or ending in .onnx are used as given.
   */
  private resolveKeywordModel(keyword: string): string {
    if (keyword.includes('/') || keyword.includes('\\') || keyword.endsWith('.onnx')) {
      return keyword;
    }
    return `${keyword}.onnx`;
  }
}
