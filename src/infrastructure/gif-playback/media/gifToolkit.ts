import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { PNG } from 'pngjs';

import type { RandomAccessGifPlayback } from '../../../domain/gif-playback/contracts/gif-playback.js';
import {
  calculateFrameTimingStats,
  hundredthsToMs,
  type FrameTimingStats,
} from '../../../shared/media/frameTiming.js';
import { FullCacheGif } from '../strategies/full-cache-gif.js';

export interface GifAnalysis {
  width: number;
  height: number;
  frameCount: number;
  durationMs: number;
  delaysMs: number[];
  timing: FrameTimingStats;
  paletteEstimate: number;
  hasTransparency: boolean;
  /** Frames identical to the one before them once composited. */
  duplicateFrames: number;
  disposalModes: number[];
}

const DEFAULT_SAMPLE_STRIDE = 4;

export async function analyzeGif(
  input: string | Uint8Array,
  sampleStride = DEFAULT_SAMPLE_STRIDE,
): Promise<GifAnalysis> {
  const playback = new FullCacheGif(await loadGifBuffer(input));
  return describePlayback(playback, sampleStride);
}

export function describePlayback(
  playback: RandomAccessGifPlayback,
  sampleStride = DEFAULT_SAMPLE_STRIDE,
): GifAnalysis {
  const { document } = playback;
  const frames = Array.from({ length: playback.frameCount }, (_, index) => playback.frame(index));
  const delaysMs = hundredthsToMs(document.graphicsControls.map((control) => control.delay));
  const disposalModes = Array.from(
    new Set(document.graphicsControls.map((control) => control.disposal)),
  ).sort((a, b) => a - b);

  return {
    width: playback.width,
    height: playback.height,
    frameCount: playback.frameCount,
    durationMs: document.totalRunTime * 10,
    delaysMs,
    timing: calculateFrameTimingStats(delaysMs),
    paletteEstimate: estimatePaletteSize(frames, sampleStride),
    hasTransparency: frames.some((frame) => frameHasTransparency(frame, sampleStride)),
    duplicateFrames: countDuplicateFrames(frames),
    disposalModes,
  };
}

export function encodeFramePng(rgba: Uint8ClampedArray, width: number, height: number): Buffer {
  if (rgba.length !== width * height * 4) {
    throw new RangeError(`Expected ${width * height * 4} RGBA bytes, received ${rgba.length}`);
  }

  const png = new PNG({ width, height });
  png.data.set(rgba);
  return PNG.sync.write(png);
}

/** Writes `frame-00000.png`, `frame-00001.png`, ... and returns their paths. */
export async function exportFramesAsPng(input: string | Uint8Array, outDir: string): Promise<string[]> {
  const playback = new FullCacheGif(await loadGifBuffer(input));
  await fs.mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (let index = 0; index < playback.frameCount; index += 1) {
    const outputPath = path.join(outDir, `frame-${String(index).padStart(5, '0')}.png`);
    await fs.writeFile(outputPath, encodeFramePng(playback.frame(index), playback.width, playback.height));
    written.push(path.resolve(outputPath));
  }

  return written;
}

async function loadGifBuffer(input: string | Uint8Array): Promise<Uint8Array> {
  if (typeof input === 'string') {
    return fs.readFile(input);
  }

  return input;
}

function countDuplicateFrames(frames: readonly Uint8ClampedArray[]): number {
  let duplicates = 0;
  let previousHash: string | null = null;

  for (const frame of frames) {
    const hash = createHash('sha1').update(frame).digest('hex');
    if (previousHash === hash) {
      duplicates += 1;
    }
    previousHash = hash;
  }

  return duplicates;
}

function estimatePaletteSize(frames: readonly Uint8ClampedArray[], stride: number): number {
  const colors = new Set<string>();
  const step = 4 * Math.max(1, stride);

  for (const frame of frames) {
    for (let index = 0; index < frame.length; index += step) {
      const r = frame[index] ?? 0;
      const g = frame[index + 1] ?? 0;
      const b = frame[index + 2] ?? 0;
      const a = frame[index + 3] ?? 0;
      colors.add(`${r}-${g}-${b}-${a}`);
    }
  }

  return colors.size;
}

function frameHasTransparency(frame: Uint8ClampedArray, stride: number): boolean {
  const step = 4 * Math.max(1, stride);

  for (let index = 3; index < frame.length; index += step) {
    if ((frame[index] ?? 255) < 255) {
      return true;
    }
  }

  return false;
}
