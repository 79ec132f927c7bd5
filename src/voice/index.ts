export { FfmpegPlayer } from './player.js';
export type { AudioPlayer, PlayerConfig } from './player.js';
