import { z } from 'zod';

import { CODE_TABLE_CAPACITY } from '../../../domain/gif-playback/value-objects/decoder-limits.js';

// Smallest possible stream: 6-byte signature plus the 7-byte screen descriptor.
const MIN_GIF_BYTES = 13;

export const decoderLimitsSchema = z.object({
  maxFrames: z.number().int().positive().max(65_535).optional(),
  maxChainLength: z.number().int().positive().max(CODE_TABLE_CAPACITY).optional(),
  maxCanvasPixels: z.number().int().positive().optional(),
});

export const loadGifPlaybackCommandSchema = z.object({
  source: z.instanceof(Uint8Array).refine((bytes) => bytes.byteLength >= MIN_GIF_BYTES, {
    message: `GIF source must hold at least ${MIN_GIF_BYTES} bytes`,
  }),
  strategy: z.enum(['full-cache', 'streaming-index', 'streaming-compressed']).default('full-cache'),
  limits: decoderLimitsSchema.default({}),
  cacheKey: z.string().min(1).optional(),
});

export type LoadGifPlaybackPayload = z.input<typeof loadGifPlaybackCommandSchema>;

export type LoadGifPlaybackInput = z.output<typeof loadGifPlaybackCommandSchema>;
