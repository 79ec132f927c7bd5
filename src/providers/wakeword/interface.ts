/**
 * Keyword spotting engine interface
 *
 * Engines consume fixed-size PCM frames and report, for every inference
 * step, one probability per configured keyword through a callback. The
 * callback runs synchronously inside `process()`.
 */
export interface KeywordEngine {
  /**
   * Engine name for logging and identification
   */
  readonly name: string;

  /**
   * Keyword names in probability order
   */
  readonly keywords: readonly string[];

  /**
   * Samples per frame expected by process() at the configured sample rate
   */
  readonly frameSamples: number;

  /**
   * Load models. Must be called before process()
   */
  initialize(): Promise<void>;

  /**
   * Register the probability callback (replaces any previous one)
   */
  onProbabilities(callback: ProbabilityCallback): void;

  /**
   * Advance inference by one frame of signed 16-bit LE mono PCM
   */
  process(frame: Buffer): Promise<void>;

  /**
   * Release resources held by the engine
   */
  dispose(): Promise<void>;

  /**
   * Check that every model artifact is present
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Receives one probability (0-1) per keyword, in `KeywordEngine.keywords` order
 */
export type ProbabilityCallback = (probabilities: readonly number[]) => void;

/**
 * Common keyword engine configuration options
 */
export interface KeywordEngineConfig {
  /** Keyword model names or .onnx paths */
  keywords: readonly string[];
  /** Path to model files directory */
  modelPath: string;
  /** Sample rate of the PCM handed to process() */
  sampleRate: number;
}
