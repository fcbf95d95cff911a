import type { IndexStream } from '../value-objects/index-stream.js';
import type {
  GraphicsControlBlock,
  ImageDescriptor,
  Palette,
} from '../value-objects/gif-blocks.js';

export type FramePayload =
  | { readonly kind: 'indices'; readonly indices: IndexStream }
  | { readonly kind: 'compressed'; readonly data: Uint8Array }
  | { readonly kind: 'released' };

export interface GifFrame {
  readonly index: number;
  readonly descriptor: ImageDescriptor;
  readonly localPalette: Palette | null;
  readonly minCodeSize: number;
  readonly graphicsControl: GraphicsControlBlock;
  readonly payload: FramePayload;
}
