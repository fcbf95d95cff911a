import { LRUCache } from 'lru-cache';

import type { RandomAccessGifPlayback } from '../../../domain/gif-playback/contracts/gif-playback.js';
import {
  resolveDecoderLimits,
  type DecoderLimits,
} from '../../../domain/gif-playback/value-objects/decoder-limits.js';

export interface CachedPlayback {
  readonly playback: RandomAccessGifPlayback;
  readonly createdAt: number;
}

/**
 * Full-cache playbacks keyed by the caller's key together with the decoder
 * limits they were parsed under, so a stricter request never sees a document
 * those limits would have rejected.
 */
export class PlaybackCache {
  private readonly cache: LRUCache<string, CachedPlayback>;

  public constructor(options: { maxEntries: number; ttlMs: number }) {
    this.cache = new LRUCache({
      max: options.maxEntries,
      ttl: options.ttlMs,
    });
  }

  public static keyFor(cacheKey: string, limits: Partial<DecoderLimits> = {}): string {
    const { maxFrames, maxChainLength, maxCanvasPixels } = resolveDecoderLimits(limits);
    return `${cacheKey}|${maxFrames}:${maxChainLength}:${maxCanvasPixels}`;
  }

  public get(cacheKey: string, limits?: Partial<DecoderLimits>): CachedPlayback | undefined {
    return this.cache.get(PlaybackCache.keyFor(cacheKey, limits));
  }

  public set(
    cacheKey: string,
    limits: Partial<DecoderLimits> | undefined,
    playback: RandomAccessGifPlayback,
  ): void {
    this.cache.set(PlaybackCache.keyFor(cacheKey, limits), { playback, createdAt: Date.now() });
  }

  public get size(): number {
    return this.cache.size;
  }
}
