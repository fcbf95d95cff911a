import type { StreamingGifPlayback } from '../../../domain/gif-playback/contracts/gif-playback.js';
import type { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import type { GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import type { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { parseGifDocument } from '../parser/block-parser.js';

import type { GifPlaybackOptions } from './full-cache-gif.js';
import { StreamingCanvas } from './streaming-canvas.js';

/** Keeps every frame's decoded indices and composites on demand. */
export class StreamingIndexGif implements StreamingGifPlayback {
  public readonly kind = 'streaming-index';

  public readonly document: GifDocument;

  private readonly logger = createChildLogger({ module: 'StreamingIndexGif' });

  private readonly canvas: StreamingCanvas;

  public constructor(bytes: Uint8Array, options: GifPlaybackOptions = {}) {
    this.document = parseGifDocument(bytes, {
      limits: options.limits,
      ingestion: { mode: 'decode', retainIndices: true },
    });
    this.canvas = new StreamingCanvas(this.document, retainedIndices);

    this.logger.debug({ frameCount: this.document.frameCount }, 'Prepared index-stream playback');
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

  public get frameIndex(): number {
    return this.canvas.frameIndex;
  }

  public tick(deltaSeconds: number): boolean {
    return this.canvas.tick(deltaSeconds);
  }

  public firstFrame(): Uint8ClampedArray {
    return this.canvas.firstFrame();
  }

  public currentFrame(): Uint8ClampedArray {
    return this.canvas.currentFrame();
  }
}

function retainedIndices(frame: GifFrame): IndexStream {
  const { payload } = frame;
  if (payload.kind !== 'indices') {
    throw new Error(`Frame ${frame.index} was parsed without its index stream`);
  }

  return payload.indices;
}
