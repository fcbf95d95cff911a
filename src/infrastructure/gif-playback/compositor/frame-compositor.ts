import type { GifFrame } from '../../../domain/gif-playback/entities/gif-frame.js';
import {
  backgroundColorOf,
  DisposalMethod,
  transparentIndexOf,
  type FrameRect,
  type Palette,
  type RgbaColor,
} from '../../../domain/gif-playback/value-objects/gif-blocks.js';
import type { IndexStream } from '../../../domain/gif-playback/value-objects/index-stream.js';
import { GifDecodeError } from '../../../shared/errors/gif-decode-error.js';
import type { ScreenContext } from '../parser/block-parser.js';

export interface CompositeRequest {
  readonly indices: IndexStream;
  readonly palette: Palette;
  readonly transparentIndex: number | null;
  readonly rect: FrameRect;
  readonly canvasWidth: number;
  readonly canvasHeight: number;
}

export function createCanvas(screen: ScreenContext): Uint8ClampedArray {
  return new Uint8ClampedArray(screen.header.width * screen.header.height * 4);
}

/**
 * Paints one frame's indices over `canvas`. Pixels carrying the transparent
 * index keep whatever the canvas already holds.
 */
export function compositeFrame(request: CompositeRequest, canvas: Uint8ClampedArray): void {
  const { indices, palette, transparentIndex, rect, canvasWidth, canvasHeight } = request;
  const expected = rect.width * rect.height;

  if (indices.count !== expected) {
    throw GifDecodeError.malformed('Index count does not match the frame rectangle', {
      count: indices.count,
      expected,
    });
  }

  if (rect.left + rect.width > canvasWidth || rect.top + rect.height > canvasHeight) {
    throw GifDecodeError.malformed('Frame rectangle lies outside the canvas', { rect });
  }

  const source = indices.indices;
  const colors = palette.colors;
  let next = 0;

  for (let row = 0; row < rect.height; row += 1) {
    let offset = ((rect.top + row) * canvasWidth + rect.left) * 4;

    for (let column = 0; column < rect.width; column += 1) {
      const index = source[next] ?? 0;
      next += 1;

      if (index !== transparentIndex) {
        if (index >= palette.size) {
          throw GifDecodeError.malformed('Colour index lies outside the palette', {
            index,
            paletteSize: palette.size,
          });
        }

        const color = index * 3;
        canvas[offset] = colors[color] ?? 0;
        canvas[offset + 1] = colors[color + 1] ?? 0;
        canvas[offset + 2] = colors[color + 2] ?? 0;
        canvas[offset + 3] = 255;
      }

      offset += 4;
    }
  }
}

export function fillCanvas(canvas: Uint8ClampedArray, color: RgbaColor): void {
  const [red, green, blue, alpha] = color;
  for (let offset = 0; offset < canvas.length; offset += 4) {
    canvas[offset] = red;
    canvas[offset + 1] = green;
    canvas[offset + 2] = blue;
    canvas[offset + 3] = alpha;
  }
}

export function fillBackground(screen: ScreenContext, canvas: Uint8ClampedArray): void {
  fillCanvas(canvas, backgroundColorOf(screen.header, screen.globalPalette));
}

export interface FrameRenderRequest {
  readonly screen: ScreenContext;
  readonly frame: GifFrame;
  readonly previousFrame: GifFrame | null;
  readonly indices: IndexStream;
}

/**
 * Advances `canvas` from the previous frame to `frame`, applying the previous
 * frame's disposal first.
 */
export function renderFrame(canvas: Uint8ClampedArray, request: FrameRenderRequest): void {
  const { screen, frame, previousFrame, indices } = request;

  if (previousFrame?.graphicsControl.disposal === DisposalMethod.ClearToBackground) {
    fillBackground(screen, canvas);
  }

  const palette = frame.localPalette ?? screen.globalPalette;
  if (!palette) {
    throw GifDecodeError.malformed('Frame has neither a local nor a global colour table', {
      frame: frame.index,
    });
  }

  compositeFrame(
    {
      indices,
      palette,
      transparentIndex: transparentIndexOf(frame.graphicsControl),
      rect: frame.descriptor,
      canvasWidth: screen.header.width,
      canvasHeight: screen.header.height,
    },
    canvas,
  );
}
