import i2c from 'i2c-bus';
import type { PromisifiedBus } from 'i2c-bus';

/**
 * Register-addressed byte bus the peripheral driver talks through.
 */
export interface RegisterBus {
  /** Write `bytes` to `register` as one block transaction */
  writeBlock(address: number, register: number, bytes: Buffer): Promise<void>;
  readBlock(address: number, register: number, length: number): Promise<Buffer>;
  writeByte(address: number, register: number, value: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * RegisterBus backed by the Linux i2c-dev interface
 */
export class I2cRegisterBus implements RegisterBus {
  private constructor(private readonly bus: PromisifiedBus) {}

  static async open(busId: number): Promise<I2cRegisterBus> {
    return new I2cRegisterBus(await i2c.openPromisified(busId));
  }

  async writeBlock(address: number, register: number, bytes: Buffer): Promise<void> {
    const { bytesWritten } = await this.bus.writeI2cBlock(address, register, bytes.length, bytes);
    if (bytesWritten !== bytes.length) {
      throw new Error(`Short block write: ${bytesWritten}/${bytes.length} bytes`);
    }
  }

  async readBlock(address: number, register: number, length: number): Promise<Buffer> {
    const { bytesRead, buffer } = await this.bus.readI2cBlock(address, register, length, Buffer.alloc(length));
    return buffer.subarray(0, bytesRead);
  }

  async writeByte(address: number, register: number, value: number): Promise<void> {
    await this.bus.writeByte(address, register, value);
  }

  async close(): Promise<void> {
    await this.bus.close();
  }
}
