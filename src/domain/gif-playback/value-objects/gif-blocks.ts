export const GIF_SIGNATURE = 'GIF';
export const GIF_VERSIONS = ['87a', '89a'] as const;
export type GifVersion = (typeof GIF_VERSIONS)[number];

export const BlockTag = {
  Extension: 0x21,
  Image: 0x2c,
  Trailer: 0x3b,
} as const;

export const ExtensionLabel = {
  PlainText: 0x01,
  /** Written by some encoders in place of 0x01. */
  PlainTextLegacy: 0x21,
  GraphicsControl: 0xf9,
  Comment: 0xfe,
  Application: 0xff,
} as const;

export const BLOCK_TERMINATOR = 0x00;

export const DisposalMethod = {
  None: 0,
  Keep: 1,
  ClearToBackground: 2,
  RestoreToPrevious: 3,
} as const;

export type DisposalMethod = (typeof DisposalMethod)[keyof typeof DisposalMethod];

/** Disposal methods a document may carry once parsed. */
export type SupportedDisposal =
  | typeof DisposalMethod.None
  | typeof DisposalMethod.Keep
  | typeof DisposalMethod.ClearToBackground;

export interface GifHeader {
  readonly signature: typeof GIF_SIGNATURE;
  readonly version: GifVersion;
  readonly width: number;
  readonly height: number;
  readonly hasGlobalColorTable: boolean;
  readonly colorResolution: number;
  readonly sortFlag: boolean;
  /** Raw 3-bit size field; the table holds 2^(field + 1) entries. */
  readonly globalColorTableSize: number;
  readonly backgroundColorIndex: number;
  readonly pixelAspectRatio: number;
}

export interface Palette {
  /** RGB triples, `size * 3` bytes. */
  readonly colors: Uint8Array;
  readonly size: number;
}

export interface FrameRect {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

export interface ImageDescriptor extends FrameRect {
  readonly hasLocalColorTable: boolean;
  readonly interlaced: boolean;
  readonly sorted: boolean;
  readonly localColorTableSize: number;
}

export interface GraphicsControlBlock {
  /** Hundredths of a second. */
  readonly delay: number;
  readonly disposal: SupportedDisposal;
  readonly hasTransparency: boolean;
  readonly transparentIndex: number;
}

export const DEFAULT_GRAPHICS_CONTROL: GraphicsControlBlock = {
  delay: 0,
  disposal: DisposalMethod.None,
  hasTransparency: false,
  transparentIndex: 0,
};

export type RgbaColor = readonly [red: number, green: number, blue: number, alpha: number];

export const TRANSPARENT_BLACK: RgbaColor = [0, 0, 0, 0];

export function paletteEntryCount(sizeField: number): number {
  return 1 << (sizeField + 1);
}

export function transparentIndexOf(control: GraphicsControlBlock): number | null {
  return control.hasTransparency ? control.transparentIndex : null;
}

export function backgroundColorOf(header: GifHeader, globalPalette: Palette | null): RgbaColor {
  if (!globalPalette || header.backgroundColorIndex >= globalPalette.size) {
    return TRANSPARENT_BLACK;
  }

  const offset = header.backgroundColorIndex * 3;
  return [
    globalPalette.colors[offset] ?? 0,
    globalPalette.colors[offset + 1] ?? 0,
    globalPalette.colors[offset + 2] ?? 0,
    255,
  ];
}
