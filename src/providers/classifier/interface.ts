/**
 * Remote image classification interface
 */
export interface ClassifierProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Upload an image and return its category label.
   * Resolves null on any transport, status or parse failure; never rejects.
   */
  classify(imagePath: string): Promise<string | null>;
}

export interface ClassifierConfig {
  url: string;
  timeoutMs: number;
}
