import type { GifDocument } from '../../../domain/gif-playback/entities/gif-document.js';
import type { GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import type { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { createCanvas, renderFrame } from '../compositor/frame-compositor.js';

import { PlaybackCursor } from './playback-cursor.js';

export type IndexSource = (frame: GifFrame) => IndexStream;

/** One working canvas plus a snapshot of frame 0 for loop restarts. */
export class StreamingCanvas {
  private readonly canvas: Uint8ClampedArray;

  private readonly firstFrameSnapshot: Uint8ClampedArray;

  private readonly cursor: PlaybackCursor;

  public constructor(
    private readonly document: GifDocument,
    private readonly indicesFor: IndexSource,
  ) {
    this.canvas = createCanvas(document);
    this.render(0);
    this.firstFrameSnapshot = this.canvas.slice();
    this.cursor = new PlaybackCursor(document);
  }

  public get frameIndex(): number {
    return this.cursor.frameIndex;
  }

  public tick(deltaSeconds: number): boolean {
    const next = this.cursor.advance(deltaSeconds);
    if (next === null) {
      return false;
    }

    if (next === 0) {
      this.canvas.set(this.firstFrameSnapshot);
    } else {
      this.render(next);
    }

    return true;
  }

  public firstFrame(): Uint8ClampedArray {
    return this.firstFrameSnapshot;
  }

  public currentFrame(): Uint8ClampedArray {
    return this.canvas;
  }

  private render(index: number): void {
    const frame = this.document.frameAt(index);
    renderFrame(this.canvas, {
      screen: this.document,
      frame,
      previousFrame: index > 0 ? this.document.frameAt(index - 1) : null,
      indices: this.indicesFor(frame),
    });
  }
}
