import type { GifDocument } from '../entities/gif-document.js';
import type { DecoderLimits } from '../value-objects/decoder-limits.js';

export type PlaybackStrategy = 'full-cache' | 'streaming-index' | 'streaming-compressed';

interface PlaybackBase {
  readonly document: GifDocument;
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  readonly durationSeconds: number;
  /** RGBA8888, `width * height * 4` bytes. */
  firstFrame(): Uint8ClampedArray;
}

export interface RandomAccessGifPlayback extends PlaybackBase {
  readonly kind: 'full-cache';
  /**
   * Returns the stored buffer itself, shared with every other caller of the
   * same playback (including cache hits). Treat it as read-only; copy it with
   * `slice()` before writing.
   */
  frame(index: number): Uint8ClampedArray;
  frameAtTime(seconds: number, looping?: boolean): Uint8ClampedArray;
}

export interface StreamingGifPlayback extends PlaybackBase {
  readonly kind: 'streaming-index' | 'streaming-compressed';
  readonly frameIndex: number;
  /** Returns true when the visible frame changed. */
  tick(deltaSeconds: number): boolean;
  currentFrame(): Uint8ClampedArray;
}

export type GifPlayback = RandomAccessGifPlayback | StreamingGifPlayback;

export interface GifPlaybackRequest {
  readonly source: Uint8Array;
  readonly strategy: PlaybackStrategy;
  readonly limits: Partial<DecoderLimits>;
  readonly cacheKey?: string;
}

export interface GifPlaybackOutcome {
  readonly playback: GifPlayback;
  readonly fromCache: boolean;
  readonly decodeTimeMs: number;
}

export interface GifPlaybackLoader {
  load(request: GifPlaybackRequest): GifPlaybackOutcome;
}
