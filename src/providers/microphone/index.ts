import type { AssistantConfig } from '../../config.js';
import type { AudioSource } from './interface.js';
import { FfmpegMicrophone } from './ffmpeg-microphone.js';

export type { AudioSource, MicrophoneConfig } from './interface.js';
export { PcmFrameBuffer } from './frame-buffer.js';

/**
 * Create the microphone source; `frameSamples` comes from the keyword engine
 */
export function createAudioSource(config: AssistantConfig, frameSamples: number): AudioSource {
  return new FfmpegMicrophone({
    device: config.audio.device,
    sampleRate: config.audio.sampleRate,
    frameBytes: frameSamples * 2,
    maxBufferedFrames: config.audio.maxBufferedFrames,
  });
}
