import { describe, it, expect } from 'vitest';
import { CommandType, decodeResult, encodeSpeakCommand, RESULT_REGISTER, SPEAK_REGISTER } from './protocol.js';

describe('peripheral protocol', () => {
  it('uses the documented register addresses', () => {
    expect(RESULT_REGISTER).toBe(0x64);
    expect(SPEAK_REGISTER).toBe(0x6e);
  });

  it('encodes command type first, phrase id second', () => {
    expect([...encodeSpeakCommand({ commandType: CommandType.CommandWord, phraseId: 3 })]).toEqual([0x00, 0x03]);
    expect([...encodeSpeakCommand({ commandType: CommandType.Announcement, phraseId: 1 })]).toEqual([0xff, 0x01]);
  });

  it('rejects phrase ids outside a byte', () => {
    expect(() => encodeSpeakCommand({ commandType: CommandType.Announcement, phraseId: 256 })).toThrow(RangeError);
    expect(() => encodeSpeakCommand({ commandType: CommandType.Announcement, phraseId: -1 })).toThrow(RangeError);
    expect(() => encodeSpeakCommand({ commandType: CommandType.Announcement, phraseId: 1.5 })).toThrow(RangeError);
  });

  it('decodes the first byte of a result read', () => {
    expect(decodeResult(Uint8Array.from([0x38]))).toBe(0x38);
    expect(decodeResult(new Uint8Array(0))).toBeNull();
  });
});
