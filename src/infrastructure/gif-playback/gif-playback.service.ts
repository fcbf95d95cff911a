import { performance } from 'node:perf_hooks';

import type {
  GifPlaybackLoader,
  GifPlaybackOutcome,
  GifPlaybackRequest,
} from '../../domain/gif-playback/contracts/gif-playback.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { roundToPrecision } from '../../shared/media/frameTiming.js';

import { PlaybackCache } from './cache/playback-cache.js';
import { createGifPlayback } from './strategies/create-gif-playback.js';

export interface GifPlaybackServiceOptions {
  readonly cacheEntries?: number;
  readonly cacheTtlMs?: number;
}

const DEFAULT_OPTIONS = {
  cacheEntries: 32,
  cacheTtlMs: 10 * 60 * 1_000,
} as const satisfies Required<GifPlaybackServiceOptions>;

/**
 * Builds playbacks and keeps recently built full-cache ones. Streaming
 * playbacks own a mutable cursor, so each request gets a fresh instance.
 */
export class GifPlaybackService implements GifPlaybackLoader {
  private readonly logger = createChildLogger({ module: 'GifPlaybackService' });

  private readonly cache: PlaybackCache;

  public constructor(options: GifPlaybackServiceOptions = {}) {
    this.cache = new PlaybackCache({
      maxEntries: options.cacheEntries ?? DEFAULT_OPTIONS.cacheEntries,
      ttlMs: options.cacheTtlMs ?? DEFAULT_OPTIONS.cacheTtlMs,
    });
  }

  public load(request: GifPlaybackRequest): GifPlaybackOutcome {
    const { cacheKey, strategy, limits } = request;
    const cacheable = cacheKey !== undefined && strategy === 'full-cache';

    if (cacheable) {
      const cached = this.cache.get(cacheKey, limits);
      if (cached) {
        this.logger.debug({ cacheKey, cachedAt: cached.createdAt }, 'Serving cached GIF playback');
        return { playback: cached.playback, fromCache: true, decodeTimeMs: 0 };
      }
    } else if (cacheKey !== undefined) {
      this.logger.debug({ cacheKey, strategy }, 'Cache key ignored for streaming playback');
    }

    const startedAt = performance.now();
    const playback = createGifPlayback(request.source, { strategy, limits });
    const decodeTimeMs = roundToPrecision(performance.now() - startedAt);

    if (cacheable && playback.kind === 'full-cache') {
      this.cache.set(cacheKey, limits, playback);
    }

    return { playback, fromCache: false, decodeTimeMs };
  }
}
