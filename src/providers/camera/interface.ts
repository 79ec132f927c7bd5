/**
 * Camera provider interface
 */
export interface CameraProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Capture one fresh frame to disk
   * @returns Path of the saved JPEG
   */
  capture(): Promise<string>;
}

export interface CameraConfig {
  /** Video device node, e.g. /dev/video0 */
  device: string;
  width: number;
  height: number;
  /** Where the snapshot is written (overwritten on every capture) */
  snapshotPath: string;
  /** ffmpeg is killed when a capture runs longer than this */
  timeoutMs: number;
}
