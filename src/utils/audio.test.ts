import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { parseWavFormat, pcmToFloat32, resample, validateWavAsset } from './audio.js';
import { ConfigError } from './errors.js';

interface WavOptions {
  audioFormat?: number;
  channels?: number;
  sampleRate?: number;
  bitsPerSample?: number;
  /** Extra chunk placed before fmt */
  leadingChunk?: boolean;
}

function wav(options: WavOptions = {}): Buffer {
  const { audioFormat = 1, channels = 1, sampleRate = 16000, bitsPerSample = 16, leadingChunk = false } = options;

  const fmt = Buffer.alloc(24);
  fmt.write('fmt ', 0, 'ascii');
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(audioFormat, 8);
  fmt.writeUInt16LE(channels, 10);
  fmt.writeUInt32LE(sampleRate, 12);
  fmt.writeUInt32LE((sampleRate * channels * bitsPerSample) / 8, 16);
  fmt.writeUInt16LE((channels * bitsPerSample) / 8, 20);
  fmt.writeUInt16LE(bitsPerSample, 22);

  const samples = Buffer.alloc(8);
  const data = Buffer.concat([Buffer.from('data', 'ascii'), Buffer.alloc(4), samples]);
  data.writeUInt32LE(samples.length, 4);

  // Odd-sized chunk exercises the pad byte
  const list = Buffer.concat([Buffer.from('LIST', 'ascii'), Buffer.alloc(4), Buffer.from('abc'), Buffer.alloc(1)]);
  list.writeUInt32LE(3, 4);

  const body = Buffer.concat([Buffer.from('WAVE', 'ascii'), ...(leadingChunk ? [list] : []), fmt, data]);
  const header = Buffer.alloc(8);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(body.length, 4);
  return Buffer.concat([header, body]);
}

describe('parseWavFormat', () => {
  it('reads the fmt chunk', () => {
    expect(parseWavFormat(wav())).toEqual({ audioFormat: 1, channels: 1, sampleRate: 16000, bitsPerSample: 16 });
  });

  it('finds fmt after other chunks', () => {
    expect(parseWavFormat(wav({ leadingChunk: true, sampleRate: 22050 })).sampleRate).toBe(22050);
  });

  it('rejects non-RIFF data', () => {
    expect(() => parseWavFormat(Buffer.from('ID3\u0003 not a wav file'))).toThrow('not a RIFF/WAVE file');
  });
});

describe('validateWavAsset', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'assets-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function asset(name: string, data: Buffer): Promise<string> {
    const filePath = path.join(dir, name);
    await writeFile(filePath, data);
    return filePath;
  }

  it('accepts mono 16 kHz 16-bit PCM', async () => {
    const filePath = await asset('ok.wav', wav());
    await expect(validateWavAsset(filePath)).resolves.toMatchObject({ sampleRate: 16000 });
  });

  it('rejects stereo', async () => {
    const filePath = await asset('stereo.wav', wav({ channels: 2 }));
    await expect(validateWavAsset(filePath)).rejects.toThrow('2 channels, expected 1');
  });

  it('lists every mismatch', async () => {
    const filePath = await asset('hifi.wav', wav({ sampleRate: 44100, bitsPerSample: 24 }));
    await expect(validateWavAsset(filePath)).rejects.toThrow('44100 Hz, expected 16000; 24-bit, expected 16');
  });

  it('rejects non-PCM encodings', async () => {
    const filePath = await asset('float.wav', wav({ audioFormat: 3 }));
    await expect(validateWavAsset(filePath)).rejects.toThrow('format 3 is not PCM');
  });

  it('reports a missing file as a configuration error', async () => {
    const failure = validateWavAsset(path.join(dir, 'missing.wav'));
    await expect(failure).rejects.toBeInstanceOf(ConfigError);
    await expect(failure).rejects.toMatchObject({ code: 'INVALID_ASSET' });
  });

  it('reports a file that is not a WAV', async () => {
    const filePath = await asset('song.mp3', Buffer.from('ID3 mp3 data here'));
    await expect(validateWavAsset(filePath)).rejects.toThrow('is not a valid WAV file');
  });
});

describe('pcm helpers', () => {
  it('scales signed 16-bit samples to [-1, 1)', () => {
    const pcm = Buffer.alloc(6);
    pcm.writeInt16LE(-32768, 0);
    pcm.writeInt16LE(0, 2);
    pcm.writeInt16LE(16384, 4);

    expect(Array.from(pcmToFloat32(pcm))).toEqual([-1, 0, 0.5]);
  });

  it('halves the sample count when downsampling 2:1', () => {
    const samples = Float32Array.from([0, 0.5, 1, 0.5]);
    expect(Array.from(resample(samples, 32000, 16000))).toEqual([0, 1]);
  });

  it('returns the input untouched when rates match', () => {
    const samples = Float32Array.from([0.25]);
    expect(resample(samples, 16000, 16000)).toBe(samples);
  });
});
