import type { RandomAccessGifPlayback } from '../../../domain/gif-playback/contracts/gif-playback.js';
import type { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import type { GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import type { DecoderLimits } from '../../../domain/gif-playback/value-objects/decoder-limits.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { createCanvas, renderFrame } from '../compositor/frame-compositor.js';
import { parseGifDocument } from '../parser/block-parser.js';

export interface GifPlaybackOptions {
  readonly limits?: Partial<DecoderLimits>;
}

/** Composites every frame up front; lookups never decode. */
export class FullCacheGif implements RandomAccessGifPlayback {
  public readonly kind = 'full-cache';

  public readonly document: GifDocument;

  private readonly logger = createChildLogger({ module: 'FullCacheGif' });

  private readonly frames: readonly Uint8ClampedArray[];

  public constructor(bytes: Uint8Array, options: GifPlaybackOptions = {}) {
    const frames: Uint8ClampedArray[] = [];
    let canvas: Uint8ClampedArray | null = null;
    let previousFrame: GifFrame | null = null;

    this.document = parseGifDocument(bytes, {
      limits: options.limits,
      ingestion: {
        mode: 'decode',
        retainIndices: false,
        onFrame: (frame, indices, screen) => {
          const target = canvas ?? createCanvas(screen);
          canvas = target;
          renderFrame(target, { screen, frame, previousFrame, indices });
          frames.push(target.slice());
          previousFrame = frame;
        },
      },
    });
    this.frames = frames;

    this.logger.debug(
      { frameCount: frames.length, bytesRetained: frames.length * (frames[0]?.length ?? 0) },
      'Cached composited GIF frames',
    );
  }

  public get width(): number {
    return this.document.width;
  }

  public get height(): number {
    return this.document.height;
  }

  public get frameCount(): number {
    return this.document.frameCount;
  }

  public get durationSeconds(): number {
    return this.document.durationSeconds;
  }

  public firstFrame(): Uint8ClampedArray {
    return this.frame(0);
  }

  public frame(index: number): Uint8ClampedArray {
    const frame = Number.isInteger(index) ? this.frames[index] : undefined;
    if (!frame) {
      throw AppError.outOfRange('gif-playback.frame-out-of-range', 'Frame index is out of range', {
        index,
        frameCount: this.frames.length,
      });
    }

    return frame;
  }

  public frameAtTime(seconds: number, looping = true): Uint8ClampedArray {
    return this.frame(this.document.frameIndexAtTime(seconds, looping));
  }
}
