/**
 * Re-chunks an arbitrary byte stream into fixed-size frames and tracks how
 * far the reader has fallen behind.
 */
export class PcmFrameBuffer {
  private chunks: Buffer[] = [];
  private buffered = 0;

  constructor(
    readonly frameBytes: number,
    readonly maxBufferedFrames: number,
  ) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0 || frameBytes % 2 !== 0) {
      throw new RangeError(`Frame size must be a positive even number of bytes, got ${frameBytes}`);
    }
  }

  /** Bytes waiting to be read */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /** Whole frames waiting to be read */
  get bufferedFrames(): number {
    return Math.floor(this.buffered / this.frameBytes);
  }

  /**
   * Append captured bytes. Returns false once the unread backlog exceeds
   * `maxBufferedFrames`; the data is kept either way.
   */
  push(chunk: Buffer): boolean {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }
    return this.bufferedFrames <= this.maxBufferedFrames;
  }

  /**
   * Remove and return one frame, or null if a full frame is not buffered yet
   */
  take(): Buffer | null {
    if (this.buffered < this.frameBytes) {
      return null;
    }

    const joined = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const frame = Buffer.from(joined.subarray(0, this.frameBytes));
    const rest = joined.subarray(this.frameBytes);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return frame;
  }

  clear(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}
