/**
 * Register map and byte layout of the voice peripheral.
 *
 * The speak register takes one 2-byte block: [commandType, phraseId].
 * The peripheral misplays commands that arrive as two single-byte writes or
 * as a little-endian word, so the payload is only ever built here.
 */

/** Last recognized phrase id (read, 1 byte, advisory) */
export const RESULT_REGISTER = 0x64;
/** Speak command (write, 2 bytes) */
export const SPEAK_REGISTER = 0x6e;

export const CommandType = {
  /** Speak a command-word phrase */
  CommandWord: 0x00,
  /** Speak a passive announcement phrase */
  Announcement: 0xff,
} as const;

export type CommandType = (typeof CommandType)[keyof typeof CommandType];

export interface SpeakCommand {
  commandType: CommandType;
  phraseId: number;
}

export function isCommandType(value: number): value is CommandType {
  return value === CommandType.CommandWord || value === CommandType.Announcement;
}

export function isPhraseId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Encode a speak command as the exact wire payload.
 */
export function encodeSpeakCommand(command: SpeakCommand): Buffer {
  if (!isCommandType(command.commandType)) {
    throw new RangeError(`Invalid command type 0x${Number(command.commandType).toString(16)}`);
  }
  if (!isPhraseId(command.phraseId)) {
    throw new RangeError(`Invalid phrase id ${command.phraseId}`);
  }
  return Buffer.from([command.commandType, command.phraseId]);
}

/**
 * Decode a result register read. Empty reads yield null.
 */
export function decodeResult(bytes: Uint8Array): number | null {
  return bytes.length > 0 ? bytes[0] : null;
}
