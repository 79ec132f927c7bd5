import { SYSTEM_EVENTS, type CategoryMapping, type EventAssets, type SystemEvent } from '../config.js';
import { logger, errorMessage } from '../utils/logger.js';
import { CommandType, type PhraseSpeaker } from '../peripheral/index.js';
import type { AudioPlayer } from '../voice/index.js';

/**
 * Speaks classification results and system events.
 *
 * A category with a configured asset is played locally; otherwise its phrase
 * id is spoken by the peripheral as an announcement. System events only ever
 * use local assets.
 */
export class AudioResponder {
  constructor(
    private readonly categories: CategoryMapping,
    private readonly events: EventAssets,
    private readonly player: AudioPlayer,
    private readonly speaker: PhraseSpeaker,
  ) {}

  /**
   * Announce a category. Resolves true when something was played or spoken.
   * Once `signal` has aborted, a failed playback is not retried on the
   * peripheral.
   */
  async announceCategory(category: string, signal?: AbortSignal): Promise<boolean> {
    const entry = Object.hasOwn(this.categories, category) ? this.categories[category] : undefined;
    const asset = entry?.asset;
    const phraseId = entry?.phraseId;

    if (asset) {
      try {
        await this.player.play(asset);
        logger.info(`Announced "${category}" from ${asset}`);
        return true;
      } catch (error) {
        if (signal?.aborted) {
          logger.debug(`Playback of "${category}" stopped by shutdown`);
          return false;
        }
        logger.warn(`Playing asset for "${category}" failed: ${errorMessage(error)}`);
        if (phraseId === undefined) {
          return false;
        }
        logger.info(`Falling back to peripheral phrase ${phraseId} for "${category}"`);
      }
    }

    if (phraseId === undefined) {
      logger.error(`No asset or phrase id configured for category "${category}"`);
      return false;
    }

    const spoken = await this.speaker.speak(CommandType.Announcement, phraseId);
    if (spoken) {
      logger.info(`Announced "${category}" via peripheral phrase ${phraseId}`);
    } else {
      logger.warn(`Peripheral did not accept phrase ${phraseId} for "${category}"`);
    }
    return spoken;
  }

  /**
   * System events that have no asset and will stay silent
   */
  missingEvents(): SystemEvent[] {
    return SYSTEM_EVENTS.filter((key) => !this.events[key]);
  }

  /**
   * Play the asset for a system event, if one is configured.
   */
  async respond(eventKey: SystemEvent): Promise<void> {
    const asset = this.events[eventKey];
    if (!asset) {
      logger.debug(`No asset for event "${eventKey}"`);
      return;
    }

    try {
      await this.player.play(asset);
    } catch (error) {
      logger.warn(`Playing event "${eventKey}" failed: ${errorMessage(error)}`);
    }
  }
}
