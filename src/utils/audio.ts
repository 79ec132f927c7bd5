import { promises as fs } from 'node:fs';
import { ConfigError } from './errors.js';

/** Format every playable asset must have */
export const REQUIRED_WAV_FORMAT = {
  channels: 1,
  sampleRate: 16000,
  bitsPerSample: 16,
} as const;

const WAVE_FORMAT_PCM = 1;

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

/**
 * Parse the fmt chunk of a RIFF/WAVE file.
 * Walks the chunk list so files with LIST/fact chunks before fmt still parse.
 */
export function parseWavFormat(data: Buffer): WavFormat {
  if (data.length < 12 || data.toString('ascii', 0, 4) !== 'RIFF' || data.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('not a RIFF/WAVE file');
  }

  let offset = 12;
  while (offset + 8 <= data.length) {
    const chunkId = data.toString('ascii', offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || body + 16 > data.length) {
        throw new Error('truncated fmt chunk');
      }
      return {
        audioFormat: data.readUInt16LE(body),
        channels: data.readUInt16LE(body + 2),
        sampleRate: data.readUInt32LE(body + 4),
        bitsPerSample: data.readUInt16LE(body + 14),
      };
    }

    // Chunks are word aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new Error('missing fmt chunk');
}

/**
 * Check that a WAV asset exists and is mono 16 kHz 16-bit PCM.
 * Throws ConfigError otherwise; bad assets are a startup problem.
 */
export async function validateWavAsset(filePath: string): Promise<WavFormat> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Audio asset not readable: ${filePath} (${reason})`, 'INVALID_ASSET', { filePath });
  }

  let format: WavFormat;
  try {
    format = parseWavFormat(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Audio asset is not a valid WAV file: ${filePath} (${reason})`, 'INVALID_ASSET', {
      filePath,
    });
  }

  const issues: string[] = [];
  if (format.audioFormat !== WAVE_FORMAT_PCM) {
    issues.push(`format ${format.audioFormat} is not PCM`);
  }
  if (format.channels !== REQUIRED_WAV_FORMAT.channels) {
    issues.push(`${format.channels} channels, expected ${REQUIRED_WAV_FORMAT.channels}`);
  }
  if (format.sampleRate !== REQUIRED_WAV_FORMAT.sampleRate) {
    issues.push(`${format.sampleRate} Hz, expected ${REQUIRED_WAV_FORMAT.sampleRate}`);
  }
  if (format.bitsPerSample !== REQUIRED_WAV_FORMAT.bitsPerSample) {
    issues.push(`${format.bitsPerSample}-bit, expected ${REQUIRED_WAV_FORMAT.bitsPerSample}`);
  }

  if (issues.length > 0) {
    throw new ConfigError(`Audio asset ${filePath} has the wrong format: ${issues.join('; ')}`, 'INVALID_ASSET', {
      filePath,
      issues,
    });
  }

  return format;
}

/**
 * Convert signed 16-bit LE PCM buffer to float32 array (-1 to 1)
 */
export function pcmToFloat32(pcmData: Buffer): Float32Array {
  const numSamples = Math.floor(pcmData.length / 2);
  const float32 = new Float32Array(numSamples);

  for (let i = 0; i < numSamples; i++) {
    float32[i] = pcmData.readInt16LE(i * 2) / 32768.0;
  }

  return float32;
}

/**
 * Simple linear interpolation resampling
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate === toRate) return samples;

  const ratio = fromRate / toRate;
  const outputLength = Math.floor(samples.length / ratio);
  const output = new Float32Array(outputLength);

  for (let i = 0; i < outputLength; i++) {
    const srcIndex = i * ratio;
    const srcIndexFloor = Math.floor(srcIndex);
    const srcIndexCeil = Math.min(srcIndexFloor + 1, samples.length - 1);
    const frac = srcIndex - srcIndexFloor;

    output[i] = samples[srcIndexFloor] * (1 - frac) + samples[srcIndexCeil] * frac;
  }

  return output;
}
