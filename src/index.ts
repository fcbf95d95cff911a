export * from './application/gif-playback/index.js';
export * from './domain/gif-playback/index.js';
export * from './infrastructure/gif-playback/index.js';
export { AppError } from './shared/errors/app-error.js';
export { BaseError } from './shared/errors/base.error.js';
export { GifDecodeError, type GifDecodeErrorKind } from './shared/errors/gif-decode-error.js';
export {
  analyzeGif,
  describePlayback,
  encodeFramePng,
  exportFramesAsPng,
  type GifAnalysis,
} from './infrastructure/gif-playback/media/gifToolkit.js';
export { calculateFrameTimingStats, type FrameTimingStats } from './shared/media/frameTiming.js';
