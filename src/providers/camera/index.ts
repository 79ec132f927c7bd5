import type { AssistantConfig } from '../../config.js';
import type { CameraProvider } from './interface.js';
import { FfmpegCamera } from './ffmpeg-camera.js';

export type { CameraProvider, CameraConfig } from './interface.js';

export function createCameraProvider(config: AssistantConfig): CameraProvider {
  return new FfmpegCamera({ ...config.camera });
}
