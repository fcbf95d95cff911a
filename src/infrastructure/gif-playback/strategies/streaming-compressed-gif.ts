import type { StreamingGifPlayback } from '../../../domain/gif-playback/contracts/gif-playback.js';
import type { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import type { GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import { resolveDecoderLimits } from '../../../domain/gif-playback/value-objects/decoder-limits.js';
import { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { CodeTable } from '../lzw/code-table.js';
import {
  createDecompressionState,
  decodeLzw,
  resetDecompressionState,
} from '../lzw/lzw-decoder.js';
import { parseGifDocument } from '../parser/block-parser.js';

import type { GifPlaybackOptions } from './full-cache-gif.js';
import { StreamingCanvas } from './streaming-canvas.js';

/**
 * Keeps only the compressed image data and runs the LZW decoder again for
 * every frame that becomes visible.
 */
export class StreamingCompressedGif implements StreamingGifPlayback {
  public readonly kind = 'streaming-compressed';

  public readonly document: GifDocument;

  private readonly logger = createChildLogger({ module: 'StreamingCompressedGif' });

  private readonly codeTable: CodeTable;

  private readonly decompression = createDecompressionState();

  private readonly indices: IndexStream;

  private readonly canvas: StreamingCanvas;

  public constructor(bytes: Uint8Array, options: GifPlaybackOptions = {}) {
    const limits = resolveDecoderLimits(options.limits);
    this.document = parseGifDocument(bytes, { limits, ingestion: { mode: 'compressed' } });
    this.codeTable = new CodeTable(limits.maxChainLength);
    this.indices = new IndexStream(this.document.width * this.document.height);

    // Decode once up front so corrupt image data fails here, not mid-playback.
    for (const frame of this.document.frames) {
      this.decodeFrame(frame);
    }

    this.canvas = new StreamingCanvas(this.document, (frame) => this.decodeFrame(frame));

    this.logger.debug(
      {
        frameCount: this.document.frameCount,
        compressedBytes: this.document.frames.reduce(
          (total, frame) => total + (frame.payload.kind === 'compressed' ? frame.payload.data.length : 0),
          0,
        ),
      },
      'Prepared compressed playback',
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

  private decodeFrame(frame: GifFrame): IndexStream {
    const { payload, descriptor } = frame;
    if (payload.kind !== 'compressed') {
      throw new Error(`Frame ${frame.index} was parsed without its compressed data`);
    }

    this.codeTable.reset(frame.minCodeSize);
    resetDecompressionState(this.decompression);
    this.indices.reset();
    decodeLzw(payload.data, this.codeTable, this.decompression, this.indices);

    const expected = descriptor.width * descriptor.height;
    if (this.indices.count !== expected) {
      throw GifDecodeError.malformed('Image data does not cover the image rectangle', {
        frame: frame.index,
        decoded: this.indices.count,
        expected,
      });
    }

    return this.indices;
  }
}
