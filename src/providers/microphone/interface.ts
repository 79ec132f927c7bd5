/**
 * Source of fixed-size PCM frames (signed 16-bit LE, mono)
 */
export interface AudioSource {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Bytes returned by each readFrame()
   */
  readonly frameBytes: number;

  /**
   * Begin capturing. Frames start buffering immediately
   */
  start(): Promise<void>;

  /**
   * Wait for the next frame. Resolves null when the stream has ended or
   * `signal` aborts; rejects when the source failed (including overrun).
   */
  readFrame(signal?: AbortSignal): Promise<Buffer | null>;

  /**
   * Stop capturing and release the device
   */
  stop(): Promise<void>;
}

export interface MicrophoneConfig {
  /** Capture device name (ALSA) */
  device: string;
  sampleRate: number;
  /** Bytes per frame handed to the keyword engine */
  frameBytes: number;
  /** Frames allowed to pile up unread before the source reports an overrun */
  maxBufferedFrames: number;
}
