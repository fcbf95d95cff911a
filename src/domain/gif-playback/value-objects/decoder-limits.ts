/** Rows in an LZW code table: 12-bit codes. */
export const CODE_TABLE_CAPACITY = 4096;

export interface DecoderLimits {
  readonly maxFrames: number;
  /** Longest code chain traced while emitting one LZW code. */
  readonly maxChainLength: number;
  /** Logical screen width × height. */
  readonly maxCanvasPixels: number;
}

export const DEFAULT_DECODER_LIMITS = {
  maxFrames: 4096,
  maxChainLength: CODE_TABLE_CAPACITY,
  maxCanvasPixels: 4096 * 4096,
} as const satisfies DecoderLimits;

export function resolveDecoderLimits(overrides: Partial<DecoderLimits> = {}): DecoderLimits {
  return {
    maxFrames: overrides.maxFrames ?? DEFAULT_DECODER_LIMITS.maxFrames,
    maxChainLength: overrides.maxChainLength ?? DEFAULT_DECODER_LIMITS.maxChainLength,
    maxCanvasPixels: overrides.maxCanvasPixels ?? DEFAULT_DECODER_LIMITS.maxCanvasPixels,
  };
}
