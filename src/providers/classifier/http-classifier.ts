import { promises as fs } from 'node:fs';
import path from 'node:path';
import FormData from 'form-data';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { logger, errorMessage } from '../../utils/logger.js';
import type { ClassifierProvider, ClassifierConfig } from './interface.js';

const classificationSchema = z.object({
  category: z.string().min(1),
});

/**
 * Classification over HTTP: multipart upload of the image in field `file`,
 * JSON response with a top-level `category` string.
 * One attempt per image; there is no retry.
 */
export class HttpClassifier implements ClassifierProvider {
  readonly name = 'http-classifier';
  private config: ClassifierConfig;
  private dispatcher: Dispatcher | undefined;

  constructor(config: ClassifierConfig, dispatcher?: Dispatcher) {
    this.config = config;
    this.dispatcher = dispatcher;
  }

  async classify(imagePath: string): Promise<string | null> {
    try {
      const image = await fs.readFile(imagePath);

      const formData = new FormData();
      formData.append('file', image, {
        filename: path.basename(imagePath),
        contentType: 'image/jpeg',
      });

      const headers: Record<string, string> = {
        ...formData.getHeaders(),
      };

      const response = await request(this.config.url, {
        method: 'POST',
        headers,
        body: formData.getBuffer(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
        dispatcher: this.dispatcher,
      });

      if (response.statusCode < 200 || response.statusCode >= 300) {
        const errorBody = await response.body.text();
        logger.warn(`Classifier error (${response.statusCode}): ${errorBody}`);
        return null;
      }

      const payload: unknown = await response.body.json();
      const parsed = classificationSchema.safeParse(payload);
      if (!parsed.success) {
        logger.warn(`Classifier response has no category`, { payload });
        return null;
      }

      logger.debug(`Classifier category: "${parsed.data.category}"`);
      return parsed.data.category;
    } catch (error) {
      logger.error(`Classification request failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
