import { logger } from '../utils/logger.js';
import type { CameraProvider } from '../providers/camera/index.js';
import type { ClassifierProvider } from '../providers/classifier/index.js';

/**
 * One photo in, one category label out
 */
export class CaptureClassifyClient {
  constructor(
    private readonly camera: CameraProvider,
    private readonly classifier: ClassifierProvider,
  ) {}

  /**
   * Capture a fresh frame. Rejects when the camera is unavailable or the
   * capture fails.
   */
  async captureImage(): Promise<string> {
    const imagePath = await this.camera.capture();
    logger.info(`Photo captured: ${imagePath}`);
    return imagePath;
  }

  /**
   * Classify a captured image. Resolves null on any failure.
   */
  async classify(imagePath: string): Promise<string | null> {
    logger.info(`Uploading ${imagePath} to ${this.classifier.name}`);
    return this.classifier.classify(imagePath);
  }
}
