import type { AssistantConfig } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { KeywordEngine } from './interface.js';
import { OpenWakeWordEngine } from './openwakeword.js';

export type { KeywordEngine, KeywordEngineConfig, ProbabilityCallback } from './interface.js';

/**
 * Create the keyword engine for the configured keyword list
 */
export function createKeywordEngine(config: AssistantConfig): KeywordEngine {
  const keywords = config.keywords.entries.map((entry) => entry.name);

  logger.info(`Initializing keyword engine: openwakeword`, { keywords });

  return new OpenWakeWordEngine({
    keywords,
    modelPath: config.keywords.modelPath,
    sampleRate: config.audio.sampleRate,
  });
}
