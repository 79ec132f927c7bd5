import { describe, it, expect, beforeEach } from 'vitest';
import type { RegisterBus } from './bus.js';
import { PeripheralDriver } from './driver.js';
import { CommandType } from './protocol.js';

interface Transaction {
  kind: 'writeBlock' | 'readBlock' | 'writeByte';
  address: number;
  register: number;
  bytes: number[];
}

class FakeBus implements RegisterBus {
  transactions: Transaction[] = [];
  failNext = false;
  resultByte = 0x05;
  closed = false;

  private check(): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('Remote I/O error');
    }
  }

  async writeBlock(address: number, register: number, bytes: Buffer): Promise<void> {
    this.check();
    this.transactions.push({ kind: 'writeBlock', address, register, bytes: [...bytes] });
  }

  async readBlock(address: number, register: number, length: number): Promise<Buffer> {
    this.check();
    this.transactions.push({ kind: 'readBlock', address, register, bytes: [] });
    return Buffer.alloc(length, this.resultByte);
  }

  async writeByte(address: number, register: number, value: number): Promise<void> {
    this.check();
    this.transactions.push({ kind: 'writeByte', address, register, bytes: [value] });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const peripheralConfig = { busId: 4, address: 0x34, resultRegister: 0x64, speakRegister: 0x6e };

describe('PeripheralDriver', () => {
  let bus: FakeBus;
  let driver: PeripheralDriver;

  beforeEach(() => {
    bus = new FakeBus();
    driver = new PeripheralDriver(bus, peripheralConfig);
  });

  it('writes speak(0x00, 3) as a single [0x00, 0x03] block to 0x6E', async () => {
    await expect(driver.speak(CommandType.CommandWord, 3)).resolves.toBe(true);

    expect(bus.transactions).toEqual([{ kind: 'writeBlock', address: 0x34, register: 0x6e, bytes: [0x00, 0x03] }]);
  });

  it('writes announcements with 0xFF first', async () => {
    await driver.speak(CommandType.Announcement, 2);

    expect(bus.transactions[0].bytes).toEqual([0xff, 0x02]);
  });

  it('reports a failed write as false instead of throwing', async () => {
    bus.failNext = true;

    await expect(driver.speak(CommandType.Announcement, 1)).resolves.toBe(false);
    expect(bus.transactions).toHaveLength(0);
  });

  it('refuses a phrase id outside a byte without touching the bus', async () => {
    await expect(driver.speak(CommandType.Announcement, 300)).resolves.toBe(false);
    expect(bus.transactions).toHaveLength(0);
  });

  it('reads one byte from the result register', async () => {
    await expect(driver.readResult()).resolves.toBe(0x05);
    expect(bus.transactions).toEqual([{ kind: 'readBlock', address: 0x34, register: 0x64, bytes: [] }]);
  });

  it('returns null when the result read fails', async () => {
    bus.failNext = true;
    await expect(driver.readResult()).resolves.toBeNull();
  });

  it('clears the result register with a zero byte', async () => {
    await expect(driver.clearResult()).resolves.toBe(true);
    expect(bus.transactions).toEqual([{ kind: 'writeByte', address: 0x34, register: 0x64, bytes: [0x00] }]);
  });

  it('closes the bus', async () => {
    await driver.close();
    expect(bus.closed).toBe(true);
  });
});
