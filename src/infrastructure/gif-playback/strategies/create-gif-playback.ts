import type {
  GifPlayback,
  PlaybackStrategy,
} from '../../../domain/gif-playback/contracts/gif-playback.js';

import { FullCacheGif, type GifPlaybackOptions } from './full-cache-gif.js';
import { StreamingCompressedGif } from './streaming-compressed-gif.js';
import { StreamingIndexGif } from './streaming-index-gif.js';

export interface CreateGifPlaybackOptions extends GifPlaybackOptions {
  readonly strategy?: PlaybackStrategy;
}

export function createGifPlayback(
  bytes: Uint8Array,
  options: CreateGifPlaybackOptions = {},
): GifPlayback {
  const { strategy = 'full-cache', limits } = options;

  switch (strategy) {
    case 'full-cache':
      return new FullCacheGif(bytes, { limits });
    case 'streaming-index':
      return new StreamingIndexGif(bytes, { limits });
    case 'streaming-compressed':
      return new StreamingCompressedGif(bytes, { limits });
    default: {
      const exhaustive: never = strategy;
      throw new Error(`Unknown playback strategy: ${String(exhaustive)}`);
    }
  }
}
