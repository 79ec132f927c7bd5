import { logger, errorMessage } from '../utils/logger.js';
import { FatalError } from '../utils/errors.js';
import { I2cRegisterBus, type RegisterBus } from './bus.js';
import { encodeSpeakCommand, decodeResult, isCommandType, isPhraseId, type CommandType } from './protocol.js';

export interface PeripheralConfig {
  busId: number;
  address: number;
  resultRegister: number;
  speakRegister: number;
}

/**
 * Anything that can make the peripheral speak a phrase
 */
export interface PhraseSpeaker {
  speak(commandType: CommandType, phraseId: number): Promise<boolean>;
}

/**
 * Driver for the voice peripheral's speak/result registers.
 *
 * The bus drops or delays commands now and then, so no method rejects:
 * failures are logged and reported through the return value.
 */
export class PeripheralDriver implements PhraseSpeaker {
  constructor(
    private readonly bus: RegisterBus,
    private readonly config: PeripheralConfig,
  ) {}

  /**
   * Open the configured I2C bus. Failing here is fatal.
   */
  static async open(config: PeripheralConfig): Promise<PeripheralDriver> {
    try {
      const bus = await I2cRegisterBus.open(config.busId);
      logger.info(`Opened I2C bus ${config.busId} for peripheral 0x${config.address.toString(16)}`);
      return new PeripheralDriver(bus, config);
    } catch (error) {
      throw new FatalError(`Cannot open I2C bus ${config.busId}: ${errorMessage(error)}`, 'BUS_OPEN_FAILED', {
        busId: config.busId,
      });
    }
  }

  async speak(commandType: CommandType, phraseId: number): Promise<boolean> {
    if (!isCommandType(commandType) || !isPhraseId(phraseId)) {
      logger.warn(`Refusing invalid speak command`, { commandType, phraseId });
      return false;
    }

    const payload = encodeSpeakCommand({ commandType, phraseId });
    try {
      await this.bus.writeBlock(this.config.address, this.config.speakRegister, payload);
      logger.debug(`Peripheral speak`, { commandType, phraseId });
      return true;
    } catch (error) {
      logger.warn(`Peripheral speak failed: ${errorMessage(error)}`, { commandType, phraseId });
      return false;
    }
  }

  /**
   * Read the last recognized phrase id. The register is not a reliable
   * recognition signal; use it for diagnostics only.
   */
  async readResult(): Promise<number | null> {
    try {
      const bytes = await this.bus.readBlock(this.config.address, this.config.resultRegister, 1);
      return decodeResult(bytes);
    } catch (error) {
      logger.warn(`Peripheral result read failed: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Reset the result register to 0 so a later read is not stale
   */
  async clearResult(): Promise<boolean> {
    try {
      await this.bus.writeByte(this.config.address, this.config.resultRegister, 0x00);
      return true;
    } catch (error) {
      logger.warn(`Peripheral result clear failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.bus.close();
    } catch (error) {
      logger.warn(`Closing I2C bus failed: ${errorMessage(error)}`);
    }
  }
}
