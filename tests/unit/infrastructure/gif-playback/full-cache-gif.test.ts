import { describe, expect, it } from 'vitest';

import { DisposalMethod } from '../../../../src/domain/gif-playback/value-objects/gif-blocks.js';
import { FullCacheGif } from '../../../../src/infrastructure/gif-playback/strategies/full-cache-gif.js';
import { AppError } from '../../../../src/shared/errors/app-error.js';
import { captureError } from '../../../helpers/errors.js';
import { buildGif, packCodes, pixelAt, type Rgb } from '../../../helpers/gif-fixture.js';

const RED: Rgb = [255, 0, 0];
const GREEN: Rgb = [0, 255, 0];
const BLUE: Rgb = [0, 0, 255];

const twoFrameGif = (delays: readonly [number, number]): Uint8Array =>
  buildGif({
    width: 2,
    height: 1,
    globalPalette: [RED, GREEN, BLUE],
    frames: [
      { width: 2, height: 1, indices: [0, 0], delay: delays[0] },
      { width: 2, height: 1, indices: [1, 2], delay: delays[1] },
    ],
  });

describe('FullCacheGif', () => {
  it('composites the 2x2 two-colour frame', () => {
    const bytes = buildGif({
      width: 2,
      height: 2,
      globalPalette: [RED, BLUE],
      frames: [
        {
          width: 2,
          height: 2,
          indices: [],
          minCodeSize: 2,
          imageData: packCodes([
            [4, 3],
            [0, 3],
            [1, 3],
            [0, 3],
            [1, 4],
            [5, 4],
          ]),
        },
      ],
    });

    const playback = new FullCacheGif(bytes);

    expect(playback.kind).toBe('full-cache');
    expect(playback.width).toBe(2);
    expect(playback.height).toBe(2);
    expect(Array.from(playback.firstFrame())).toEqual([
      255, 0, 0, 255, 0, 0, 255, 255, 255, 0, 0, 255, 0, 0, 255, 255,
    ]);
  });

  it('selects frames by time with half-open delay intervals', () => {
    const playback = new FullCacheGif(twoFrameGif([10, 20]));

    expect(playback.durationSeconds).toBeCloseTo(0.3, 10);
    expect(playback.frameAtTime(0.05)).toBe(playback.frame(0));
    expect(playback.frameAtTime(0.1)).toBe(playback.frame(1));
    expect(playback.frameAtTime(0.15)).toBe(playback.frame(1));
    expect(playback.frameAtTime(0.29)).toBe(playback.frame(1));
    expect(playback.frameAtTime(0.35, true)).toBe(playback.frame(0));
  });

  it('holds the last frame past the end when not looping', () => {
    const playback = new FullCacheGif(twoFrameGif([10, 20]));

    expect(playback.frameAtTime(0.35, false)).toBe(playback.frame(1));
    expect(playback.frameAtTime(12, false)).toBe(playback.frame(1));
  });

  it('maps a time and the same time shifted by whole loops to the same frame', () => {
    const playback = new FullCacheGif(twoFrameGif([25, 50]));

    for (const seconds of [0, 0.25, 0.5, 0.74]) {
      expect(playback.frameAtTime(seconds + 0.75 * 4)).toBe(playback.frameAtTime(seconds));
    }
  });

  it('shows frame 0 for every time when all delays are zero', () => {
    const playback = new FullCacheGif(twoFrameGif([0, 0]));

    expect(playback.durationSeconds).toBe(0);
    expect(playback.frameAtTime(5)).toBe(playback.frame(0));
  });

  it('stores an independent buffer per frame', () => {
    const playback = new FullCacheGif(twoFrameGif([10, 20]));

    expect(pixelAt(playback.frame(0), 2, 0, 0)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(playback.frame(1), 2, 0, 0)).toEqual([0, 255, 0, 255]);
    expect(pixelAt(playback.frame(1), 2, 1, 0)).toEqual([0, 0, 255, 255]);
  });

  it('clears to the background colour after a clear-to-background frame', () => {
    const frames = (disposal: number) =>
      buildGif({
        width: 2,
        height: 1,
        globalPalette: [RED, GREEN, BLUE],
        backgroundIndex: 2,
        frames: [
          { width: 2, height: 1, indices: [0, 0], delay: 10, disposal },
          { width: 1, height: 1, left: 1, indices: [1], delay: 10 },
        ],
      });

    const cleared = new FullCacheGif(frames(DisposalMethod.ClearToBackground)).frame(1);
    const kept = new FullCacheGif(frames(DisposalMethod.Keep)).frame(1);

    expect(Array.from(cleared)).toEqual([0, 0, 255, 255, 0, 255, 0, 255]);
    expect(Array.from(kept)).toEqual([255, 0, 0, 255, 0, 255, 0, 255]);
  });

  it('lets transparent pixels show the previous frame', () => {
    const bytes = buildGif({
      width: 2,
      height: 1,
      globalPalette: [RED, GREEN, BLUE],
      frames: [
        { width: 2, height: 1, indices: [2, 2], delay: 10 },
        { width: 2, height: 1, indices: [0, 1], delay: 10, transparentIndex: 0 },
      ],
    });

    expect(Array.from(new FullCacheGif(bytes).frame(1))).toEqual([0, 0, 255, 255, 0, 255, 0, 255]);
  });

  it('paints the transparent index when the transparency flag is clear', () => {
    // Flag bit unset, transparent index byte 1.
    const control = Uint8Array.from([0x21, 0xf9, 0x04, 0x00, 0x0a, 0x00, 0x01, 0x00]);
    const bytes = buildGif({
      width: 1,
      height: 1,
      globalPalette: [RED, GREEN],
      frames: [{ width: 1, height: 1, indices: [1], noControl: true, before: [control] }],
    });

    expect(Array.from(new FullCacheGif(bytes).firstFrame())).toEqual([0, 255, 0, 255]);
  });

  it('leaves never-painted pixels transparent black', () => {
    const bytes = buildGif({
      width: 2,
      height: 1,
      globalPalette: [RED, GREEN],
      frames: [{ width: 1, height: 1, left: 1, indices: [0] }],
    });

    expect(Array.from(new FullCacheGif(bytes).firstFrame())).toEqual([0, 0, 0, 0, 255, 0, 0, 255]);
  });

  it('shares the stored buffer between lookups', () => {
    const playback = new FullCacheGif(twoFrameGif([10, 20]));

    expect(playback.frame(0)).toBe(playback.frame(0));
    expect(playback.firstFrame()).toBe(playback.frame(0));
    expect(playback.frameAtTime(0.15)).toBe(playback.frame(1));
  });

  it('is deterministic across instances', () => {
    const bytes = twoFrameGif([10, 20]);

    expect(new FullCacheGif(bytes).frame(1)).toEqual(new FullCacheGif(bytes).frame(1));
  });

  it('rejects out-of-range frame indices and negative times', () => {
    const playback = new FullCacheGif(twoFrameGif([10, 20]));

    for (const error of [
      captureError(() => playback.frame(2)),
      captureError(() => playback.frame(-1)),
      captureError(() => playback.frame(0.5)),
    ]) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'gif-playback.frame-out-of-range' });
    }

    expect(captureError(() => playback.frameAtTime(-0.01))).toMatchObject({
      code: 'gif-playback.invalid-time',
    });
  });
});
